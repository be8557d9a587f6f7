import * as fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import type { Stats } from "node:fs";
import * as path from "node:path";
import {
  AttachmentError,
  IOError,
  InvalidNameError,
  NotFoundError,
  errnoCode,
  toIOError,
} from "../errors.js";
import { SystemOpener } from "../shell/opener.js";
import type { Opener } from "../shell/opener.js";
import type {
  AddFileFailure,
  AddFilesResult,
  Attachment,
  AttachmentBackend,
  AttachmentOperation,
  AttachmentStoreHooks,
  StoredFile,
} from "../types/attachment.js";
import { parseDateKey } from "./date-key.js";
import type { DateKey } from "./date-key.js";
import { parseFileName } from "./file-name.js";
import type { FileName } from "./file-name.js";
import {
  runAfterAddHooks,
  runAfterClearHooks,
  runAfterDeleteHooks,
  runErrorHooks,
} from "./hooks.js";
import { candidateNames, compareNames } from "./naming.js";

export const ATTACHMENTS_DIR_NAME = "_files";

export interface FolderAttachmentStoreOptions {
  /** Root under which `<YYYY-MM-DD>/_files/` folders are created */
  dataDir: string;
  opener?: Opener;
  hooks?: AttachmentStoreHooks;
}

/**
 * Stores attachments under `<dataDir>/<YYYY-MM-DD>/_files/`.
 *
 * Every call is a self-contained sequence of filesystem steps; nothing is
 * cached between calls, so changes made to the folders outside the store
 * show up on the next call.
 */
export class FolderAttachmentStore implements AttachmentBackend {
  readonly dataDir: string;
  private readonly opener: Opener;
  private readonly hooks?: AttachmentStoreHooks;

  constructor(options: FolderAttachmentStoreOptions) {
    this.dataDir = path.resolve(options.dataDir);
    this.opener = options.opener ?? new SystemOpener();
    this.hooks = options.hooks;
  }

  /** Attachment folder for a date. Does not create it. */
  folderPath(dateKey: string): string {
    return this.folderFor(parseDateKey(dateKey));
  }

  async addFiles(dateKey: string, sources: readonly string[]): Promise<AddFilesResult> {
    return this.guard("add", async () => {
      const key = parseDateKey(dateKey);
      const folder = await this.ensureFolder(key);
      const taken = new Set(await this.readFolder(folder));

      const stored: StoredFile[] = [];
      const failures: AddFileFailure[] = [];
      for (const source of sources) {
        try {
          const name = await this.copyInto(folder, source, taken);
          stored.push({ source, name, path: path.join(folder, name) });
        } catch (err: unknown) {
          if (!isAddFailure(err)) throw err;
          failures.push({ source, error: err });
          await runErrorHooks(this.hooks, { operation: "add", error: err });
        }
      }

      const result: AddFilesResult = { dateKey: key, folder, stored, failures };
      await runAfterAddHooks(this.hooks, { dateKey: key, result });
      return result;
    });
  }

  async listFiles(dateKey: string): Promise<Attachment[]> {
    return this.guard("list", async () => {
      return this.readAttachments(this.folderFor(parseDateKey(dateKey)));
    });
  }

  async deleteFile(dateKey: string, fileName: string): Promise<void> {
    return this.guard("delete", async () => {
      const key = parseDateKey(dateKey);
      const name = parseFileName(fileName);
      const target = await this.existingAttachment(key, name);
      try {
        await fs.unlink(target);
      } catch (err: unknown) {
        if (errnoCode(err) === "ENOENT") {
          throw new NotFoundError(`Attachment not found: ${name}`, { path: target, cause: err });
        }
        throw toIOError(err, "Failed to delete attachment", target);
      }
      await runAfterDeleteHooks(this.hooks, { dateKey: key, name, path: target });
    });
  }

  /** Absolute path of an existing attachment. */
  async locate(dateKey: string, fileName: string): Promise<string> {
    return this.guard("locate", async () => {
      return this.existingAttachment(parseDateKey(dateKey), parseFileName(fileName));
    });
  }

  /** Opens an attachment with its default application; resolves to its path. */
  async openFile(dateKey: string, fileName: string): Promise<string> {
    return this.guard("open", async () => {
      const target = await this.existingAttachment(
        parseDateKey(dateKey),
        parseFileName(fileName),
      );
      try {
        await this.opener.open(target);
      } catch (err: unknown) {
        throw toIOError(err, "Failed to open attachment", target);
      }
      return target;
    });
  }

  /** Creates the folder if needed and reveals it; resolves to its path. */
  async openDateFolder(dateKey: string): Promise<string> {
    return this.guard("openFolder", async () => {
      const folder = await this.ensureFolder(parseDateKey(dateKey));
      try {
        await this.opener.open(folder);
      } catch (err: unknown) {
        throw toIOError(err, "Failed to open attachment folder", folder);
      }
      return folder;
    });
  }

  /**
   * Removes the date's attachment folder with everything in it and resolves
   * to the number of attachments that were in it. The date directory itself
   * is kept.
   */
  async clearDate(dateKey: string): Promise<number> {
    return this.guard("clear", async () => {
      const key = parseDateKey(dateKey);
      const folder = this.folderFor(key);
      const removed = (await this.readAttachments(folder)).length;
      try {
        await fs.rm(folder, { recursive: true, force: true });
      } catch (err: unknown) {
        throw toIOError(err, "Failed to remove attachment folder", folder);
      }
      await runAfterClearHooks(this.hooks, { dateKey: key, folder, removed });
      return removed;
    });
  }

  /** Whether the data directory exists (or can be created) and is writable. */
  async checkHealth(): Promise<{ ok: boolean; error?: string }> {
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      await fs.access(this.dataDir, fsConstants.W_OK);
      return { ok: true };
    } catch (err: unknown) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  // --- AttachmentBackend ---

  add(dateKey: string, sources: readonly string[]): Promise<AddFilesResult> {
    return this.addFiles(dateKey, sources);
  }

  list(dateKey: string): Promise<Attachment[]> {
    return this.listFiles(dateKey);
  }

  delete(dateKey: string, fileName: string): Promise<void> {
    return this.deleteFile(dateKey, fileName);
  }

  // --- internals ---

  private folderFor(key: DateKey): string {
    return path.join(this.dataDir, key, ATTACHMENTS_DIR_NAME);
  }

  private async ensureFolder(key: DateKey): Promise<string> {
    const folder = this.folderFor(key);
    try {
      await fs.mkdir(folder, { recursive: true });
    } catch (err: unknown) {
      throw toIOError(err, "Failed to create attachment folder", folder);
    }
    return folder;
  }

  private async readFolder(folder: string): Promise<string[]> {
    try {
      return await fs.readdir(folder);
    } catch (err: unknown) {
      throw toIOError(err, "Failed to read attachment folder", folder);
    }
  }

  /** Regular files in `folder`, sorted by name; empty if it does not exist. */
  private async readAttachments(folder: string): Promise<Attachment[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(folder);
    } catch (err: unknown) {
      // ENOTDIR: the date path exists as a plain file, so there is no folder.
      if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return [];
      throw toIOError(err, "Failed to read attachment folder", folder);
    }

    const attachments: Attachment[] = [];
    for (const name of entries) {
      const full = path.join(folder, name);
      let stats: Stats;
      try {
        stats = await fs.lstat(full);
      } catch (err: unknown) {
        // Removed between readdir and lstat
        if (errnoCode(err) === "ENOENT") continue;
        throw toIOError(err, "Failed to read attachment", full);
      }
      if (!stats.isFile()) continue;
      attachments.push({
        name,
        path: full,
        sizeBytes: stats.size,
        modifiedAt: stats.mtime,
      });
    }
    return attachments.sort((a, b) => compareNames(a.name, b.name));
  }

  private async existingAttachment(key: DateKey, name: FileName): Promise<string> {
    const folder = this.folderFor(key);
    const target = path.join(folder, name);
    if (path.dirname(target) !== folder) {
      throw new InvalidNameError(`File name escapes the attachment folder: ${name}`, {
        value: name,
      });
    }
    try {
      const stats = await fs.lstat(target);
      if (!stats.isFile()) {
        throw new NotFoundError(`Not an attachment: ${name}`, { path: target });
      }
    } catch (err: unknown) {
      if (err instanceof AttachmentError) throw err;
      if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
        throw new NotFoundError(`Attachment not found: ${name}`, { path: target, cause: err });
      }
      throw toIOError(err, "Failed to read attachment", target);
    }
    return target;
  }

  /**
   * Copies `source` into `folder` under the first free candidate name and
   * records the name in `taken`. Creation is exclusive, so a name that
   * appeared since `taken` was read is skipped rather than overwritten.
   */
  private async copyInto(
    folder: string,
    source: string,
    taken: Set<string>,
  ): Promise<string> {
    let sourceStats: Stats;
    try {
      sourceStats = await fs.stat(source);
    } catch (err: unknown) {
      if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
        throw new NotFoundError(`Source file not found: ${source}`, { path: source, cause: err });
      }
      throw toIOError(err, "Failed to read source file", source);
    }
    if (!sourceStats.isFile()) {
      throw new NotFoundError(`Source is not a regular file: ${source}`, { path: source });
    }

    for (const candidate of candidateNames(path.basename(source))) {
      if (taken.has(candidate)) continue;
      const dest = path.join(folder, candidate);
      try {
        await fs.copyFile(source, dest, fsConstants.COPYFILE_EXCL);
      } catch (err: unknown) {
        if (errnoCode(err) === "EEXIST") {
          taken.add(candidate);
          continue;
        }
        throw await discardPartial(dest, toIOError(err, "Failed to copy file", source));
      }
      taken.add(candidate);
      try {
        await fs.utimes(dest, sourceStats.atime, sourceStats.mtime);
      } catch (err: unknown) {
        throw await discardPartial(dest, toIOError(err, "Failed to preserve file times", dest));
      }
      return candidate;
    }
    // candidateNames never ends
    throw new Error("unreachable");
  }

  private async guard<T>(operation: AttachmentOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof AttachmentError) {
        await runErrorHooks(this.hooks, { operation, error: err });
      }
      throw err;
    }
  }
}

/**
 * Removes what a failed copy left at `dest` and resolves to the error to
 * throw. The copy failure stays the reported error; a failed removal is
 * only appended to its message.
 */
async function discardPartial(dest: string, failure: IOError): Promise<IOError> {
  try {
    await fs.rm(dest, { force: true });
    return failure;
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    return new IOError(`${failure.message} (could not remove partial copy: ${detail})`, {
      path: failure.path,
      code: failure.code,
      cause: failure.cause,
    });
  }
}

function isAddFailure(err: unknown): err is NotFoundError | IOError {
  return err instanceof NotFoundError || err instanceof IOError;
}
