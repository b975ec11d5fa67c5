export type Severity = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW" | "UNKNOWN" | "WARNING" | "NONE";

export type ToolLanguageId = "python" | "typescript";

export interface DetectedTool {
  name: string;
  /** Path relative to the repository root, POSIX separators. The synthetic record holds the root itself. */
  filePath: string;
  description: string;
  lineNumber: number;
}

/** Wire shape of a tool record in JSON output. */
export interface ToolRecord {
  name: string;
  file_path: string;
  description: string;
  line_number: number;
}

export type ToolsByFile = Map<string, DetectedTool[]>;

export type ViolationRecord = Record<string, unknown>;

export type ScannerResults = Record<string, ViolationRecord[]>;

export interface SeverityCounts {
  CRITICAL: number;
  HIGH: number;
  MEDIUM: number;
  LOW: number;
}

export interface SummaryRow {
  orgRepo: string;
  filename: string;
  total: number;
  worstSeverity: string;
  severityCounts: SeverityCounts;
  fixable: number;
  scanners: string;
  status: string;
}

export function toolToRecord(tool: DetectedTool): ToolRecord {
  return {
    name: tool.name,
    file_path: tool.filePath,
    description: tool.description,
    line_number: tool.lineNumber
  };
}
