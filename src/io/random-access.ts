/**
 * Positioned reads on an open file handle
 *
 * Region queries seek into block-compressed files; each query owns one
 * handle so concurrent queries never share a file position.
 */

import { open, type FileHandle } from "node:fs/promises";
import { FileError } from "../errors";
import type { FilePath } from "../types";
import { validatePath } from "./file-reader";

export class RandomAccessFile {
  private closed = false;

  private constructor(
    readonly path: FilePath,
    readonly size: number,
    private readonly handle: FileHandle
  ) {}

  /**
   * Open a file for positioned reads
   *
   * @throws {FileError} If the file cannot be opened
   */
  static async open(path: string): Promise<RandomAccessFile> {
    const validatedPath = validatePath(path);
    let handle: FileHandle;
    try {
      handle = await open(validatedPath, "r");
    } catch (error) {
      throw FileError.fromSystemError("open", validatedPath, error);
    }

    try {
      const stats = await handle.stat();
      return new RandomAccessFile(validatedPath, stats.size, handle);
    } catch (error) {
      await handle.close();
      throw FileError.fromSystemError("stat", validatedPath, error);
    }
  }

  /**
   * Read up to `length` bytes starting at `position`
   *
   * Fewer bytes are returned near the end of the file.
   */
  async read(position: number, length: number): Promise<Uint8Array> {
    if (this.closed) {
      throw new FileError("File handle is closed", this.path, "read");
    }
    const available = Math.max(0, Math.min(length, this.size - position));
    if (available === 0) {
      return new Uint8Array(0);
    }

    try {
      const buffer = new Uint8Array(available);
      const { bytesRead } = await this.handle.read(buffer, 0, available, position);
      return buffer.subarray(0, bytesRead);
    } catch (error) {
      throw FileError.fromSystemError("read", this.path, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.handle.close();
    } catch (error) {
      throw FileError.fromSystemError("close", this.path, error);
    }
  }
}
