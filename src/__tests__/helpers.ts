import { type FileSystemAdapter } from '@/services/persistence/documentStorage';

/** Run `fn` and return what it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

/** Await `promise` and return its rejection reason. */
export async function rejected(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

const missing = (path: string) => Object.assign(new Error(`ENOENT: no such file '${path}'`), { code: 'ENOENT' });

export interface MemoryFileSystem extends FileSystemAdapter {
  files: Map<string, Uint8Array>;
}

/** In-process file system keyed by path. */
export function createMemoryFileSystem(files = new Map<string, Uint8Array>()): MemoryFileSystem {
  return {
    files,
    readFile: async (path) => {
      const data = files.get(path);
      if (!data) throw missing(path);
      return data;
    },
    writeFile: async (path, data) => {
      files.set(path, data);
    },
    copyFile: async (from, to) => {
      const data = files.get(from);
      if (!data) throw missing(from);
      files.set(to, data);
    },
    rename: async (from, to) => {
      const data = files.get(from);
      if (!data) throw missing(from);
      files.set(to, data);
      files.delete(from);
    },
    unlink: async (path) => {
      if (!files.delete(path)) throw missing(path);
    },
    exists: async (path) => files.has(path),
  };
}

/** A promise plus the function that settles it. */
export function createGate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}
