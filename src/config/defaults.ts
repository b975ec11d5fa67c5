import type { ToolLanguageId } from "../types.js";

export const DEFAULT_SCANNERS = ["trivy", "osv-scanner", "semgrep"];

export const DEFAULT_REPORT_PATH = "SCAN_RESULTS.md";

export const DEFAULT_REPO_BASE_URL = "https://github.com";

export const DEFAULT_RESULTS_LINK_PREFIX = "results";

export const DEFAULT_LANGUAGES: ToolLanguageId[] = ["python", "typescript"];

export const LANGUAGE_EXTENSIONS: Record<ToolLanguageId, string[]> = {
  python: [".py"],
  typescript: [".ts", ".tsx"]
};

export const PYTHON_MANIFEST_FILES = ["requirements.txt", "pyproject.toml", "Pipfile"];

export const PACKAGE_MANIFEST_FILE = "package.json";

export const PYTHON_MCP_MARKERS = ["mcp", "fastmcp"];

export const PACKAGE_MCP_MARKERS = ["modelcontextprotocol", "mcp"];

export const UNDETECTED_TOOL_NAME = "unknown";

export const UNDETECTED_TOOL_DESCRIPTION = "MCP server with undetected tools";

export const STATE_DIR_NAME = ".mcpscan";
