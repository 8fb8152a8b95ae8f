import assert from "node:assert/strict";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { test } from "node:test";
import { CommandRunner, OcrExtractor } from "../../documents/extractors/ocr.extractor";
import { noopLogger } from "../helpers/fakes";

const options = { pdftoppmPath: "pdftoppm", tesseractPath: "tesseract", dpi: 300, language: "eng" };

function fakeRunner(calls: string[][], failOn?: string): CommandRunner {
  return async (file, args) => {
    calls.push([file, ...args]);
    if (file === failOn || basename(args[0] ?? "") === failOn) {
      throw new Error(`${file} exited with code 1`);
    }
    if (file === "pdftoppm") {
      const prefix = args[4] ?? "";
      for (const page of [10, 2, 1]) {
        await writeFile(`${prefix}-${page}.png`, "png");
      }
      return { stdout: "" };
    }
    return { stdout: `  text of ${basename(args[0] ?? "")}\n` };
  };
}

test("rasterizes the PDF and recognizes pages in numeric order", async () => {
  const root = await mkdtemp(join(tmpdir(), "ocr-test-"));
  try {
    const calls: string[][] = [];
    const extractor = new OcrExtractor(options, noopLogger, fakeRunner(calls), root);
    const result = await extractor.extract(Buffer.from("%PDF-1.4"));

    assert.equal(result.pageCount, 3);
    assert.equal(result.text, "text of page-1.png\n\ntext of page-2.png\n\ntext of page-10.png");
    assert.deepEqual(calls[0]?.slice(0, 4), ["pdftoppm", "-r", "300", "-png"]);
    assert.deepEqual(calls[1]?.slice(2), ["stdout", "-l", "eng"]);
    assert.deepEqual(await readdir(root), []);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test("removes the working directory when recognition fails", async () => {
  const root = await mkdtemp(join(tmpdir(), "ocr-test-"));
  try {
    const extractor = new OcrExtractor(options, noopLogger, fakeRunner([], "tesseract"), root);
    await assert.rejects(extractor.extract(Buffer.from("%PDF-1.4")), /tesseract exited with code 1/);
    assert.deepEqual(await readdir(root), []);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test("skips a page that fails recognition and keeps the rest", async () => {
  const root = await mkdtemp(join(tmpdir(), "ocr-test-"));
  try {
    const warnings: string[] = [];
    const logger = { ...noopLogger, warn: (message: string) => warnings.push(message) };
    const extractor = new OcrExtractor(options, logger, fakeRunner([], "page-2.png"), root);
    const result = await extractor.extract(Buffer.from("%PDF-1.4"));

    assert.equal(result.pageCount, 3);
    assert.equal(result.text, "text of page-1.png\n\ntext of page-10.png");
    assert.deepEqual(warnings, ["ingestion.ocr.page_failed"]);
    assert.deepEqual(await readdir(root), []);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test("stops the running command when the caller aborts", async () => {
  const root = await mkdtemp(join(tmpdir(), "ocr-test-"));
  try {
    const controller = new AbortController();
    let sawAbort = false;
    const hangingRunner: CommandRunner = (_file, _args, commandOptions) =>
      new Promise((_resolve, reject) => {
        const kill = (): void => {
          sawAbort = true;
          reject(new Error("pdftoppm killed"));
        };
        if (commandOptions.signal?.aborted) {
          kill();
          return;
        }
        commandOptions.signal?.addEventListener("abort", kill, { once: true });
      });
    const extractor = new OcrExtractor(options, noopLogger, hangingRunner, root);

    const pending = extractor.extract(Buffer.from("%PDF-1.4"), controller.signal);
    setTimeout(() => controller.abort(new Error("deadline reached")), 20);

    await assert.rejects(pending, /pdftoppm killed/);
    assert.equal(sawAbort, true);
    assert.deepEqual(await readdir(root), []);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});
