import { describe, it, expect } from "vitest";
import { aggregate, displayHost, extractDomain, groupByDomain } from "../src/aggregate/aggregateByDomain";
import { formatMetric, median } from "../src/metrics/metricKinds";
import { joinedRow } from "./utils/rows";

describe("extractDomain", () => {
  it("keeps scheme and host, lower-cased", () => {
    expect(extractDomain("https://Shop.Example.com/products/1?x=1")).toBe("https://shop.example.com");
    expect(extractDomain("http://shop.example.com:8080/a")).toBe("http://shop.example.com:8080");
    expect(extractDomain("shop.example.com/live")).toBe("https://shop.example.com");
  });

  it("strips scheme and www for display", () => {
    expect(displayHost("https://www.shop.example.com")).toBe("shop.example.com");
  });
});

describe("groupByDomain", () => {
  it("sums counts and takes the median of rates", () => {
    const rows = [
      joinedRow({ page_url: "https://a.example/1", metrics: { VIDEO_VIEWS: 10, VIEWTHROUGH_RATE: 0.1 } }),
      joinedRow({ page_url: "https://a.example/2", metrics: { VIDEO_VIEWS: 20, VIEWTHROUGH_RATE: 0.9 } }),
      joinedRow({ page_url: "https://a.example/3", metrics: { VIDEO_VIEWS: 5, VIEWTHROUGH_RATE: 0.2 } }),
    ];

    const [group] = groupByDomain(rows);

    expect(group.domain).toBe("https://a.example");
    expect(group.sample_count).toBe(3);
    expect(group.metrics).toEqual({ VIDEO_VIEWS: 35, VIEWTHROUGH_RATE: 0.2 });
  });

  it("averages the middle pair for an even number of rates", () => {
    expect(median([0.1, 0.3])).toBe(0.2);
  });

  it("leaves a metric absent when no row in the group has it", () => {
    const rows = [
      joinedRow({ page_url: "https://a.example/1", metrics: { VIDEO_VIEWS: 1 } }),
      joinedRow({ page_url: "https://a.example/2", metrics: {} }),
    ];

    const [group] = groupByDomain(rows);

    expect(group.metrics).toEqual({ VIDEO_VIEWS: 1 });
    expect("A2C_RATE" in group.metrics).toBe(false);
    expect(formatMetric("A2C_RATE", group.metrics.A2C_RATE)).toBe("-");
  });

  it("takes descriptive fields from the first row and keeps first-seen order", () => {
    const rows = [
      joinedRow({ page_url: "https://b.example/1", account_name: "Bee" }),
      joinedRow({ page_url: "https://a.example/1", account_name: "Ay" }),
      joinedRow({ page_url: "https://b.example/2", account_name: "Bee Two" }),
    ];

    const groups = groupByDomain(rows);

    expect(groups.map((g) => g.domain)).toEqual(["https://b.example", "https://a.example"]);
    expect(groups[0].account_name).toBe("Bee");
    expect(groups[0].sample_count).toBe(2);
  });
});

describe("aggregate", () => {
  it("passes rows through when grouping is off", () => {
    const rows = [joinedRow()];
    const result = aggregate(rows, false);
    expect(result).toEqual({ grouped: false, rows });
  });
});
