/**
 * Atomic file system utilities for crash-safe state and log files.
 *
 * These utilities implement the write-tmp-fsync-rename pattern to ensure
 * atomic file writes that survive crashes and power failures on POSIX systems.
 */

import { open, rename, unlink, readFile, mkdir, appendFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

/**
 * Options for atomic writes.
 */
export interface AtomicWriteOptions {
  /** File mode applied to the new file (e.g. 0o640) */
  mode?: number;
}

/**
 * Returns the errno code of a Node.js fs error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Returns true when an AtomicFsError (or raw fs error) means "file does not exist".
 */
export function isNotFound(error: unknown): boolean {
  if (error instanceof AtomicFsError) {
    return errnoCode(error.cause) === 'ENOENT';
  }
  return errnoCode(error) === 'ENOENT';
}

/**
 * Atomically writes JSON data to a file using the write-tmp-fsync-rename pattern.
 *
 * This ensures that the file is never in a partially-written state, even if the
 * process crashes or the system loses power during the write operation.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/var/lib/ovpn-watchdog/last_status.json', record, { mode: 0o640 });
 * ```
 */
export async function atomicWriteJson<T>(
  filePath: string,
  data: T,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    // Serialize with 2-space indent for readability
    const content = JSON.stringify(data, null, 2) + '\n';

    fileHandle = await open(tmpPath, 'w', options.mode);
    await fileHandle.writeFile(content, 'utf-8');

    // open() only applies the mode on creation; a leftover tmp keeps its old one
    if (options.mode !== undefined) {
      await fileHandle.chmod(options.mode);
    }

    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    // Atomic rename (POSIX guarantees atomicity)
    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch((closeError: unknown) => {
        console.warn(`Failed to close ${tmpPath}: ${String(closeError)}`);
      });
    }

    await unlink(tmpPath).catch((unlinkError: unknown) => {
      if (!isNotFound(unlinkError)) {
        console.warn(`Failed to remove ${tmpPath}: ${String(unlinkError)}`);
      }
    });

    throw new AtomicFsError(
      `Failed to atomically write JSON to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads and parses a JSON file.
 *
 * The result is `unknown` on purpose: callers validate the shape.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Appends text to a file, creating the file and its directory if needed.
 *
 * A trailing newline is added when missing so consecutive records never run
 * into each other. The whole record is written with a single append call.
 *
 * @throws {AtomicFsError} If the append fails
 */
export async function appendText(filePath: string, text: string): Promise<void> {
  const content = text.endsWith('\n') ? text : `${text}\n`;
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await appendFile(filePath, content, 'utf-8');
  } catch (error) {
    throw new AtomicFsError(
      `Failed to append to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}
