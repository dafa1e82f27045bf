/*
Purpose: spot application-level failures hidden inside successful tool responses.
Assumptions: servers report operational errors as plain text content.
Usage: const { isError, detail } = checkForOperationalError(extractText(result));
*/

import type { ContentBlock, ResourceContent } from "./session.js";

const OPERATIONAL_ERROR_PATTERNS: RegExp[] = [
  /Error (?:listing|getting|creating|updating|deleting|scaling)/i,
  /Kubernetes API Error/i,
  /\d{3} Forbidden/i,
  /is forbidden:/i,
  /cannot (?:list|get|create|update|delete|patch) resource/i,
  /Permission denied/i,
  /Unauthorized/i,
  /Authentication failed/i,
  /Connection refused/i,
  /Connection timeout/i,
  /No route to host/i,
];

const CONTEXT_BEFORE = 50;
const CONTEXT_AFTER = 450;

export type OperationalErrorCheck = {
  isError: boolean;
  detail?: string;
};

export function checkForOperationalError(text: string): OperationalErrorCheck {
  for (const pattern of OPERATIONAL_ERROR_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const start = Math.max(0, match.index - CONTEXT_BEFORE);
    const end = Math.min(text.length, match.index + match[0].length + CONTEXT_AFTER);
    const detail = text.slice(start, end).trim().replace(/\s+/g, " ");

    return { isError: true, detail };
  }

  return { isError: false };
}

/** First text block of a tool result, or an empty string. */
export function extractText(content: ContentBlock[]): string {
  const block = content.find((entry) => entry.type === "text" && entry.text !== undefined);
  return block?.text ?? "";
}

export function extractResourceText(contents: ResourceContent[]): string {
  return contents
    .map((entry) => entry.text)
    .filter((text): text is string => text !== undefined)
    .join("\n");
}
