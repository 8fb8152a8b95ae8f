#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { createAnalysisPipeline } from "../src/app";
import { loadEnv } from "../src/config/env";
import { SUPPORTED_MIME_TYPES } from "../src/shared/types/document.types";

const MIME_BY_EXTENSION: Record<string, string> = {
  ".pdf": SUPPORTED_MIME_TYPES.pdf,
  ".docx": SUPPORTED_MIME_TYPES.docx,
  ".txt": SUPPORTED_MIME_TYPES.text,
  ".md": SUPPORTED_MIME_TYPES.text,
};

async function run(): Promise<void> {
  const [resumePath, jobPath, jobTitle] = process.argv.slice(2);
  if (!resumePath || !jobPath) {
    throw new Error("Usage: analyze-file <resume.pdf|docx|txt> <job-description.txt> [job title]");
  }

  const env = loadEnv();
  const { pipeline } = await createAnalysisPipeline(env);
  const content = await readFile(resumePath);
  const jobDescription = await readFile(jobPath, "utf8");

  const outcome = await pipeline.run({
    document: {
      content,
      fileName: basename(resumePath),
      declaredMimeType: MIME_BY_EXTENSION[extname(resumePath).toLowerCase()],
      sizeBytes: content.length,
    },
    jobDescription,
    jobTitle,
    requestId: `cli-${Date.now()}`,
  });

  console.log(JSON.stringify(outcome, null, 2));
  if (!outcome.ok) {
    process.exitCode = 2;
  }
}

run().catch((error) => {
  console.error("analyze-file failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
