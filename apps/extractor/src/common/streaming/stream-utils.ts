/**
 * File helpers for demo input and result output
 */

import { createReadStream, promises as fs } from "fs";
import * as path from "path";

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a file chunk by chunk into a Blob for multipart upload
 */
export async function readFileToBlob(
  filePath: string,
  type = "application/octet-stream",
): Promise<Blob> {
  const chunks: Buffer[] = [];
  for await (const chunk of createReadStream(filePath)) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return new Blob(chunks, { type });
}

/**
 * Write a text file, creating parent directories as needed
 *
 * @returns bytes written
 */
export async function writeTextFile(filePath: string, content: string): Promise<number> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf-8");
  return Buffer.byteLength(content, "utf-8");
}
