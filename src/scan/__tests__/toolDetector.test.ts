import assert from "node:assert/strict";
import path from "node:path";
import { test } from "node:test";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { ToolDetector, detectToolsInRepo } from "../toolDetector.js";

async function withRepo(files: Record<string, string | Buffer>, run: (repoPath: string) => Promise<void>): Promise<void> {
  const repoPath = await mkdtemp(path.join(tmpdir(), "mcpscan-detect-"));
  try {
    for (const [relativePath, content] of Object.entries(files)) {
      const filePath = path.join(repoPath, relativePath);
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, content);
    }
    await run(repoPath);
  } finally {
    await rm(repoPath, { recursive: true, force: true });
  }
}

const PYTHON_SERVER = [
  "@tool()",
  "def first():",
  "    pass",
  "",
  "@server.tool()",
  "async def second(x: int) -> str:",
  '    """Second tool."""',
  '    return ""',
  ""
].join("\n");

const TYPESCRIPT_SERVER = 'import x from "y";\n\n@Tool({ name: "t1", description: "desc" }) function t1() {}\n';

test("tool detector: python then typescript with relative paths and line numbers", async () => {
  await withRepo(
    {
      "server.py": PYTHON_SERVER,
      "src/index.ts": TYPESCRIPT_SERVER,
      "src/broken.ts": Buffer.concat([
        Buffer.from([0xff, 0xfe]),
        Buffer.from('@Tool({ name: "hidden" }) function hidden() {}\n')
      ])
    },
    async (repoPath) => {
      const detector = new ToolDetector(repoPath);
      const tools = await detector.detectTools();

      assert.deepEqual(tools, [
        { name: "first", filePath: "server.py", description: "", lineNumber: 1 },
        { name: "second", filePath: "server.py", description: "Second tool.", lineNumber: 5 },
        { name: "t1", filePath: "src/index.ts", description: "desc", lineNumber: 3 }
      ]);

      const byFile = detector.getToolsByFile();
      assert.deepEqual([...byFile.keys()], ["server.py", "src/index.ts"]);
      assert.deepEqual(
        byFile.get("server.py")?.map((tool) => tool.name),
        ["first", "second"]
      );
    }
  );
});

test("tool detector: CRLF line endings count as one line break", async () => {
  await withRepo(
    { "tools.py": "@tool()\r\ndef a():\r\n    pass\r\n\r\n@tool()\r\ndef b():\r\n    pass\r\n" },
    async (repoPath) => {
      const tools = await detectToolsInRepo(repoPath);
      assert.deepEqual(
        tools.map((tool) => [tool.name, tool.lineNumber]),
        [
          ["a", 1],
          ["b", 5]
        ]
      );
    }
  );
});

test("tool detector: .tsx files are scanned", async () => {
  await withRepo({ "ui/panel.tsx": "@Tool({}) function render() {}\n" }, async (repoPath) => {
    const tools = await detectToolsInRepo(repoPath);
    assert.deepEqual(tools, [{ name: "render", filePath: "ui/panel.tsx", description: "", lineNumber: 1 }]);
  });
});

test("tool detector: repeated passes do not accumulate", async () => {
  await withRepo({ "server.py": PYTHON_SERVER }, async (repoPath) => {
    const detector = new ToolDetector(repoPath);
    await detector.detectTools();
    const second = await detector.detectTools();
    assert.equal(second.length, 2);
  });
});

test("tool detector: exclude patterns skip matching files", async () => {
  await withRepo(
    { "vendor/lib.py": "@tool()\ndef vendored():\n    pass\n", "app.py": "@tool()\ndef mine():\n    pass\n" },
    async (repoPath) => {
      const tools = await detectToolsInRepo(repoPath, { exclude: ["vendor/**"] });
      assert.deepEqual(
        tools.map((tool) => tool.name),
        ["mine"]
      );
    }
  );
});

test("tool detector: fastmcp requirement without matches yields one placeholder", async () => {
  await withRepo({ "requirements.txt": "fastmcp>=2.0\n" }, async (repoPath) => {
    const tools = await detectToolsInRepo(repoPath);
    assert.deepEqual(tools, [
      { name: "unknown", filePath: repoPath, description: "MCP server with undetected tools", lineNumber: 0 }
    ]);
  });
});

test("tool detector: MCP package dependency without matches yields one placeholder", async () => {
  await withRepo(
    { "package.json": JSON.stringify({ dependencies: { "@modelcontextprotocol/sdk": "^1.0.0" } }) },
    async (repoPath) => {
      const tools = await detectToolsInRepo(repoPath);
      assert.equal(tools.length, 1);
      assert.equal(tools[0]?.name, "unknown");
    }
  );
});

test("tool detector: no MCP manifest and no matches yields nothing", async () => {
  await withRepo({ "requirements.txt": "requests\n", "main.py": "print('hi')\n" }, async (repoPath) => {
    assert.deepEqual(await detectToolsInRepo(repoPath), []);
  });
});

test("tool detector: placeholder can be turned off", async () => {
  await withRepo({ "requirements.txt": "mcp\n" }, async (repoPath) => {
    assert.deepEqual(await detectToolsInRepo(repoPath, { manifestFallback: false }), []);
  });
});

test("tool detector: missing repository path rejects", async () => {
  const missing = path.join(tmpdir(), "mcpscan-does-not-exist", "repo");
  await assert.rejects(detectToolsInRepo(missing), (err: unknown) => {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
  });
});
