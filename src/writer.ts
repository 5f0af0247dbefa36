// src/writer.ts — Write a finished document to disk
// Content goes to a temporary file beside the target and is renamed into place,
// so a failed write never leaves a partial document or clobbers the previous one.

import { closeSync, mkdirSync, openSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { DestinationError } from "./types.js";

/** Sibling path the document is staged at before the rename. */
export function temporaryPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${process.pid}.tmp`);
}

export function writeDocument(dir: string, fileName: string, content: string): string {
  const filePath = resolve(dir, fileName);
  const tempPath = temporaryPathFor(filePath);

  let fd: number;
  try {
    mkdirSync(dir, { recursive: true });
    fd = openSync(tempPath, "wx");
  } catch (err: unknown) {
    throw new DestinationError(filePath, toError(err));
  }

  try {
    try {
      writeFileSync(fd, content, "utf-8");
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);
  } catch (err: unknown) {
    rmSync(tempPath, { force: true });
    throw new DestinationError(filePath, toError(err));
  }
  return filePath;
}

function toError(err: unknown): Error | undefined {
  return err instanceof Error ? err : undefined;
}
