import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { discoverFiles, toPosixRelative, type DiscoverOptions } from "../discover.js";
import { detectLanguage, filenameStem, isKnownFilename } from "../language.js";
import {
  DEFAULT_EXCLUDES,
  DEFAULT_GENERATED_PATHS,
  DEFAULT_INCLUDE_EXTENSIONS,
  DEFAULT_INCLUDE_FILENAMES
} from "../../config/defaults.js";

test("languages come from the extension, then from well-known file names", () => {
  assert.equal(detectLanguage("src/app.tsx"), "javascript");
  assert.equal(detectLanguage("pkg/main.GO"), "go");
  assert.equal(detectLanguage("deploy/Dockerfile.prod"), "dockerfile");
  assert.equal(detectLanguage(".env.local"), "shell");
  assert.equal(detectLanguage("Makefile"), "shell");
  assert.equal(detectLanguage("data.parquet"), "text");
  assert.equal(detectLanguage("constructor"), "text");
});

test("filename stems drop suffixes", () => {
  assert.equal(filenameStem("Dockerfile.prod"), "dockerfile");
  assert.equal(filenameStem(".env.production"), ".env");
  assert.equal(filenameStem(".gitignore"), ".gitignore");
  assert.equal(isKnownFilename("ci/Jenkinsfile", DEFAULT_INCLUDE_FILENAMES), true);
  assert.equal(isKnownFilename("ci/.gitignore", DEFAULT_INCLUDE_FILENAMES), false);
});

test("relative paths use forward slashes", () => {
  assert.equal(toPosixRelative("/repo", path.join("/repo", "src", "a.ts")), "src/a.ts");
});

const write = async (root: string, relPath: string, content = "x = 1\n") => {
  const target = path.join(root, relPath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, content);
};

test("discovery honors gitignore, excludes and generated paths", async (t) => {
  const root = await mkdtemp(path.join(os.tmpdir(), "polygate-discover-"));
  t.after(() => rm(root, { recursive: true, force: true }));

  await write(root, ".gitignore", "# local files\nsecret/\n");
  await write(root, "src/app.ts");
  await write(root, "src/app.test.ts");
  await write(root, "src/util.py");
  await write(root, "secret/key.py");
  await write(root, "node_modules/lib/index.js");
  await write(root, "dist/out.js");
  await write(root, "assets/app.min.js");
  await write(root, "Dockerfile.prod");
  await write(root, ".env.local");
  await write(root, "notes.bin");
  await write(root, ".git/HEAD.py");

  const options: DiscoverOptions = {
    root,
    includeExtensions: DEFAULT_INCLUDE_EXTENSIONS,
    includeFilenames: DEFAULT_INCLUDE_FILENAMES,
    exclude: [...DEFAULT_EXCLUDES, "**/*.test.ts"],
    generatedPaths: DEFAULT_GENERATED_PATHS,
    includeGenerated: false
  };

  const candidates = await discoverFiles(options);
  assert.deepEqual(
    candidates.map((candidate) => [candidate.path, candidate.language]),
    [
      [".env.local", "shell"],
      ["Dockerfile.prod", "dockerfile"],
      ["src/app.ts", "javascript"],
      ["src/util.py", "python"]
    ]
  );
  assert.equal(candidates[3].sizeBytes, 6);
  assert.equal(candidates[3].absolutePath, path.join(root, "src", "util.py"));

  const withGenerated = await discoverFiles({ ...options, includeGenerated: true });
  assert.deepEqual(
    withGenerated.map((candidate) => candidate.path),
    [".env.local", "Dockerfile.prod", "assets/app.min.js", "dist/out.js", "node_modules/lib/index.js", "src/app.ts", "src/util.py"]
  );
});

test("a file given as the root is the only candidate", async (t) => {
  const root = await mkdtemp(path.join(os.tmpdir(), "polygate-discover-"));
  t.after(() => rm(root, { recursive: true, force: true }));
  await write(root, "src/util.py");

  const candidates = await discoverFiles({
    root: path.join(root, "src", "util.py"),
    includeExtensions: [],
    includeFilenames: [],
    exclude: [],
    generatedPaths: [],
    includeGenerated: false
  });
  assert.deepEqual(candidates, [
    { path: "util.py", absolutePath: path.join(root, "src", "util.py"), language: "python", sizeBytes: 6 }
  ]);
});
