/**
 * Effect-based table storage
 *
 * Every file the pipeline reads or writes goes through this service, so the
 * orchestrator and the union/overview stores can run against the real file
 * system or against an in-memory map.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const storage = yield* TableStorage;
 *   yield* storage.writeText("out/union_table.csv", csv);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(TableStorage.Live)));
 * ```
 *
 * @module io/table-storage
 */

import { FileSystem } from "@effect/platform";
import { NodeFileSystem } from "@effect/platform-node";
import { Context, Effect, Layer, Option } from "effect";
import { FileError } from "../errors";
import { type DirectoryEntry, listDirectory, readText } from "./file-reader";
import { writeString } from "./file-writer";

/**
 * Shape of the storage service
 */
export interface TableStorageShape {
  /** Whole file as text, `None` when the file does not exist */
  readonly readText: (path: string) => Effect.Effect<Option.Option<string>, FileError>;

  /** Replace a file's content, creating parent directories */
  readonly writeText: (path: string, content: string) => Effect.Effect<void, FileError>;

  /** Entries of a directory, sorted by name */
  readonly listDirectory: (path: string) => Effect.Effect<readonly DirectoryEntry[], FileError>;
}

export class TableStorage extends Context.Tag("@hla-peptide-pipeline/TableStorage")<
  TableStorage,
  TableStorageShape
>() {
  /**
   * Node.js file system storage
   */
  static readonly Live: Layer.Layer<TableStorage> = Layer.effect(
    TableStorage,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const provideFs = Effect.provideService(FileSystem.FileSystem, fs);
      return {
        readText: (path) => provideFs(readText(path)),
        writeText: (path, content) => provideFs(writeString(path, content)),
        listDirectory: (path) => provideFs(listDirectory(path)),
      } satisfies TableStorageShape;
    })
  ).pipe(Layer.provide(NodeFileSystem.layer));

  /**
   * Storage backed by a path → content map
   *
   * Directories are implied by the keys: `a/b/c.csv` makes `a` and `a/b`
   * directories.
   */
  static memory(files: Map<string, string> = new Map()): Layer.Layer<TableStorage> {
    return Layer.succeed(TableStorage, createMemoryStorage(files));
  }
}

/**
 * In-memory storage over `files`; writes are visible in the map
 */
export function createMemoryStorage(files: Map<string, string>): TableStorageShape {
  return {
    readText: (path) => Effect.sync(() => Option.fromNullable(files.get(path))),

    writeText: (path, content) =>
      Effect.sync(() => {
        files.set(path, content);
      }),

    listDirectory: (path) =>
      Effect.gen(function* () {
        const prefix = `${path.replace(/\/+$/, "")}/`;
        const entries = new Map<string, DirectoryEntry>();

        for (const key of files.keys()) {
          if (!key.startsWith(prefix)) continue;
          const rest = key.slice(prefix.length);
          const [name = "", ...deeper] = rest.split("/");
          if (name === "" || entries.has(name)) continue;
          entries.set(name, { name, path: prefix + name, isDirectory: deeper.length > 0 });
        }

        if (entries.size === 0) {
          return yield* Effect.fail(
            new FileError(`list operation failed: no such directory ${path}`, path, "list")
          );
        }

        return [...entries.values()].sort((a, b) => (a.name < b.name ? -1 : 1));
      }),
  };
}
