export type LogSink = Pick<Console, "log" | "warn">;

export const silentLog: LogSink = {
  log: () => undefined,
  warn: () => undefined,
};
