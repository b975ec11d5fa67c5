import { LANGUAGE_EXTENSIONS } from "../../config/defaults.js";
import { byOffset, type ToolLanguage, type ToolMatch } from "./shared.js";

// Group 1 is the optional explicit name, group 2 the function identifier.
// Identifiers are Unicode word runs (letters, digits, combining marks, connectors).
const PYTHON_TOOL_PATTERNS: RegExp[] = [
  /@(?:mcp|server)\.tool\(\s*(?:name=["']([^"']+)["'])?\s*\)\s*(?:async\s+)?def\s+([\p{L}\p{N}\p{Mn}\p{Mc}\p{Pc}]+)/gu,
  /@tool\(\s*(?:name=["']([^"']+)["'])?\s*\)\s*(?:async\s+)?def\s+([\p{L}\p{N}\p{Mn}\p{Mc}\p{Pc}]+)/gu
];

const DOCSTRING_PATTERN = /def\s+([\p{L}\p{N}\p{Mn}\p{Mc}\p{Pc}]+)\s*\([^)]*\)\s*(?:->.*?)?\s*:\s*"""([^"]+)"""/gsu;

/** First docstring line per function name; a later definition replaces an earlier one. */
export function extractDocstrings(content: string): Map<string, string> {
  const docstrings = new Map<string, string>();
  for (const match of content.matchAll(DOCSTRING_PATTERN)) {
    const funcName = match[1];
    const docstring = match[2];
    if (!funcName || docstring === undefined) continue;
    docstrings.set(funcName, docstring.trim().split("\n")[0] ?? "");
  }
  return docstrings;
}

export function detectPythonTools(content: string): ToolMatch[] {
  const docstrings = extractDocstrings(content);
  const matches: ToolMatch[] = [];

  for (const pattern of PYTHON_TOOL_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      const funcName = match[2];
      if (!funcName || match.index === undefined) continue;
      matches.push({
        name: match[1] || funcName,
        description: docstrings.get(funcName) ?? "",
        index: match.index
      });
    }
  }

  return byOffset(matches);
}

export const pythonToolLanguage: ToolLanguage = {
  id: "python",
  extensions: LANGUAGE_EXTENSIONS.python,
  detect: detectPythonTools
};
