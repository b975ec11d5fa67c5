import assert from "node:assert/strict";
import path from "node:path";
import { test } from "node:test";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import {
  buildSummaryRow,
  buildSummaryRows,
  formatSummaryRow,
  generateSummaryTable,
  parseRepoResultsFileName,
  sortSummaryRows
} from "../summaryTable.js";

const SCANNERS = ["trivy", "osv-scanner", "semgrep"];

const HEADER_LINES = [
  "# Vulnerability Scan Results",
  "",
  "| Project | Results | Total | Critical | High | Medium | Low | Fixable | Scanners | Status |",
  "|---------|---------|-------|----------|------|--------|-----|---------|----------|--------|"
];

async function withResultsDir(files: Record<string, unknown>, run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(tmpdir(), "mcpscan-summary-"));
  try {
    for (const [name, content] of Object.entries(files)) {
      await writeFile(path.join(dir, name), JSON.stringify(content));
    }
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("summary: file names split at the first hyphen", () => {
  assert.deepEqual(parseRepoResultsFileName("acme-my-repo-violations.json"), ["acme", "my-repo"]);
  assert.equal(parseRepoResultsFileName("trivy-violations.json"), null);
});

test("summary: no-findings repositories come before critical ones, ties alphabetical", async () => {
  await withResultsDir(
    {
      "acme-alpha-violations.json": {
        trivy: [{ severity: "CRITICAL", fixed_version: "1.0.1" }, { severity: "LOW" }]
      },
      "zeta-gamma-violations.json": { semgrep: [] },
      "acme-beta-violations.json": {},
      "osv-scanner-violations.json": { "osv-scanner": [{ severity: "HIGH" }] }
    },
    async (dir) => {
      const table = await generateSummaryTable(dir, { scanners: SCANNERS });
      assert.equal(
        table,
        [
          ...HEADER_LINES,
          "| [acme/beta](https://github.com/acme/beta) | [📋](results/acme-beta-violations.json) | 0 | 0 | 0 | 0 | 0 | 0 | None | 🟢 |",
          "| [zeta/gamma](https://github.com/zeta/gamma) | [📋](results/zeta-gamma-violations.json) | 0 | 0 | 0 | 0 | 0 | 0 | semgrep | 🟢 |",
          "| [acme/alpha](https://github.com/acme/alpha) | [📋](results/acme-alpha-violations.json) | 2 | 1 | 0 | 0 | 1 | 1 | trivy | 🔴 |"
        ].join("\n")
      );
    }
  );
});

test("summary: rows follow negated severity rank", async () => {
  await withResultsDir(
    {
      "a-high-violations.json": { trivy: [{ severity: "HIGH" }] },
      "a-medium-violations.json": { trivy: [{ severity: "MEDIUM" }] },
      "a-warning-violations.json": { semgrep: [{ severity: "WARNING" }] },
      "a-critical-violations.json": { trivy: [{ severity: "CRITICAL" }] }
    },
    async (dir) => {
      const rows = await buildSummaryRows(dir, { scanners: SCANNERS });
      assert.deepEqual(
        rows.map((row) => row.orgRepo),
        ["a/warning", "a/medium", "a/high", "a/critical"]
      );
    }
  );
});

test("summary: unranked worst severity sorts first", () => {
  const ranked = buildSummaryRow("org", "ranked", { trivy: [] });
  const unranked = { ...buildSummaryRow("org", "unranked", {}), worstSeverity: "EXOTIC" };
  assert.deepEqual(
    sortSummaryRows([ranked, unranked]).map((row) => row.orgRepo),
    ["org/unranked", "org/ranked"]
  );
});

test("summary: link bases are configurable", () => {
  const row = buildSummaryRow("acme", "widget", { trivy: [{ severity: "MEDIUM" }] });
  assert.equal(
    formatSummaryRow(row, { repoBaseUrl: "https://git.example.com/", resultsLinkPrefix: "scan/results/" }),
    "| [acme/widget](https://git.example.com/acme/widget) | [📋](scan/results/acme-widget-violations.json) | 1 | 0 | 0 | 1 | 0 | 0 | trivy | 🟡 |"
  );
});

test("summary: empty results directory renders only the header", async () => {
  await withResultsDir({}, async (dir) => {
    assert.equal(await generateSummaryTable(dir, { scanners: SCANNERS }), HEADER_LINES.join("\n"));
  });
});

test("summary: dot-prefixed results files are included", async () => {
  await withResultsDir(
    {
      ".team-infra-violations.json": { trivy: [{ severity: "LOW" }] },
      "acme-web-violations.json": { trivy: [] }
    },
    async (dir) => {
      const rows = await buildSummaryRows(dir, { scanners: SCANNERS });
      assert.deepEqual(
        rows.map((row) => [row.orgRepo, row.filename]),
        [
          ["acme/web", "acme-web-violations.json"],
          [".team/infra", ".team-infra-violations.json"]
        ]
      );
    }
  );
});
