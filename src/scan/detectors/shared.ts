import type { ToolLanguageId } from "../../types.js";

export interface ToolMatch {
  name: string;
  description: string;
  /** Offset of the match start in the normalized content. */
  index: number;
}

export interface ToolLanguage {
  id: ToolLanguageId;
  extensions: string[];
  detect: (content: string) => ToolMatch[];
}

export function normalizeNewlines(content: string): string {
  return content.replace(/\r\n?/g, "\n");
}

export function lineNumberAt(content: string, index: number): number {
  let count = 0;
  for (let i = 0; i < index && i < content.length; i += 1) {
    if (content.charCodeAt(i) === 10) count += 1;
  }
  return count + 1;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function byOffset(matches: ToolMatch[]): ToolMatch[] {
  return [...matches].sort((a, b) => a.index - b.index);
}
