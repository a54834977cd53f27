import type { ReportLanguage } from "../config/env";
import type { PageContext } from "./pageContext";
import type { ReportCase } from "./types";

export const FALLBACK_DESCRIPTIONS: Record<ReportLanguage, string> = {
  ja: "このサイトの説明は自動生成できませんでした。",
  en: "A description of this site could not be generated.",
};

export function fallbackDescription(language: ReportLanguage): string {
  return FALLBACK_DESCRIPTIONS[language];
}

export function buildDescriptionPrompt(
  reportCase: ReportCase,
  context: PageContext | null,
  language: ReportLanguage
): string {
  const facts = [
    `URL: ${reportCase.domain}`,
    reportCase.company_name ? `Company: ${reportCase.company_name}` : "",
    reportCase.industry ? `Industry: ${reportCase.industry}` : "",
    context?.title ? `Page title: ${context.title}` : "",
    context?.description ? `Meta description: ${context.description}` : "",
  ].filter(Boolean);

  if (language === "ja") {
    return [
      "以下のウェブサイトについて、どのような企業・サービスのサイトかを日本語で2文、100文字程度で説明してください。",
      "推測が難しい場合は分かる範囲で簡潔に書き、前置きや箇条書きは使わないでください。",
      "",
      ...facts,
    ].join("\n");
  }
  return [
    "Describe the company or service behind the following website in two plain English sentences (about 40 words).",
    "If details are unclear, stay brief and factual. No preamble, no bullet points.",
    "",
    ...facts,
  ].join("\n");
}
