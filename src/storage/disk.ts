/**
 * Local filesystem storage backend.
 */
import { createReadStream, createWriteStream } from "node:fs";
import {
  copyFile,
  mkdir,
  readdir,
  readFile,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { pipeline } from "node:stream/promises";
import type { EntryStat, StorageBackend } from "./backend.js";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolve(key: string): string {
    const full = resolve(this.basePath, key);
    const rel = relative(this.basePath, full);
    if (rel.startsWith("..") || isAbsolute(rel)) {
      throw new Error(`Key escapes storage root: ${key}`);
    }
    return full;
  }

  locate(key: string): string {
    return this.resolve(key);
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const fullPath = this.resolve(key);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async ensureDir(key: string): Promise<void> {
    await mkdir(this.resolve(key), { recursive: true });
  }

  async read(key: string): Promise<Uint8Array> {
    const buf = await readFile(this.resolve(key));
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  async *readStream(key: string): AsyncIterable<Uint8Array> {
    for await (const chunk of createReadStream(this.resolve(key))) {
      yield chunk;
    }
  }

  async list(prefix: string): Promise<string[]> {
    const prefixPath = this.resolve(prefix);
    const s = await this.stat(prefix);
    if (!s) return [];
    if (s.kind === "file") return [prefix];

    const keys: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          // Make key relative to basePath
          keys.push(relative(this.basePath, full).split(sep).join("/"));
        }
      }
    };

    await walk(prefixPath);
    return keys.sort();
  }

  async listDir(key: string): Promise<string[]> {
    try {
      const names = await readdir(this.resolve(key));
      return names.sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }

  async stat(key: string): Promise<EntryStat | null> {
    try {
      const s = await stat(this.resolve(key));
      return { kind: s.isDirectory() ? "directory" : "file", size: s.size };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    return (await this.stat(key)) !== null;
  }

  async copy(from: string, to: string): Promise<void> {
    const target = this.resolve(to);
    await mkdir(dirname(target), { recursive: true });
    await copyFile(this.resolve(from), target);
  }

  async concat(sources: string[], to: string): Promise<number> {
    const target = this.resolve(to);
    await mkdir(dirname(target), { recursive: true });
    // Truncate first so every source can be appended in order.
    await writeFile(target, new Uint8Array(0));

    let written = 0;
    for (const source of sources) {
      const out = createWriteStream(target, { flags: "a" });
      await pipeline(createReadStream(this.resolve(source)), out);
      written += out.bytesWritten;
    }
    return written;
  }

  async rename(from: string, to: string): Promise<void> {
    const target = this.resolve(to);
    await mkdir(dirname(target), { recursive: true });
    await rename(this.resolve(from), target);
  }

  async deleteTree(key: string): Promise<void> {
    await rm(this.resolve(key), { recursive: true, force: true });
  }
}
