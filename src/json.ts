import * as fs from "fs";
import * as path from "path";
import writeFileAtomic from "write-file-atomic";
import type { z } from "zod";
import { InvalidConfigError, errorMessage } from "./errors.js";

/**
 * Read and validate a JSON document. A missing file is a valid state and
 * yields `undefined`; unreadable JSON or a schema mismatch throws
 * InvalidConfigError naming the file.
 */
export function readJson<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> | undefined {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === "ENOENT") return undefined;
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new InvalidConfigError(file, errorMessage(err));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(file, formatIssues(parsed.error));
  }
  return parsed.data;
}

/** 2-space JSON with a trailing newline, written through a temp file and rename. */
export function writeJsonAtomic(file: string, data: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  writeFileAtomic.sync(file, JSON.stringify(data, null, 2) + "\n", { encoding: "utf-8" });
}

export function formatIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
