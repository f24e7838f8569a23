/**
 * File reading on top of Effect Platform's FileSystem
 *
 * Peptide tables come out of ProteomeDiscoverer as UTF-8 or UTF-16, so raw
 * bytes are decoded by BOM first and by trial otherwise.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import { FileError } from "../errors";

/**
 * Entry of a directory listing
 */
export interface DirectoryEntry {
  readonly name: string;
  readonly path: string;
  readonly isDirectory: boolean;
}

/**
 * Decode file bytes as UTF-8 or UTF-16
 *
 * A BOM decides the encoding. Without one, strict UTF-8 is tried first and
 * UTF-16LE is the fallback.
 *
 * @throws {Error} when neither encoding decodes the bytes
 */
export function decodeText(bytes: Uint8Array): string {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return new TextDecoder("utf-16le").decode(bytes.subarray(2));
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return new TextDecoder("utf-16be").decode(bytes.subarray(2));
  }
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return new TextDecoder("utf-8").decode(bytes.subarray(3));
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return new TextDecoder("utf-16le", { fatal: true }).decode(bytes);
  }
}

/**
 * Read a whole file as text
 *
 * @returns `None` when the file does not exist
 */
export const readText = (
  path: string
): Effect.Effect<Option.Option<string>, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fs
      .exists(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
    if (!exists) {
      return Option.none();
    }

    const bytes = yield* fs
      .readFile(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));

    return yield* Effect.try({
      try: () => Option.some(decodeText(bytes)),
      catch: () =>
        new FileError(
          `Could not decode ${path}: only UTF-8 and UTF-16 are accepted`,
          path,
          "read"
        ),
    });
  });

/**
 * List a directory, sorted by name
 */
export const listDirectory = (
  path: string
): Effect.Effect<readonly DirectoryEntry[], FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const names = yield* fs
      .readDirectory(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("list", path, error)));

    const sorted = [...names].sort();
    return yield* Effect.forEach(sorted, (name) => {
      const entryPath = `${path.replace(/\/+$/, "")}/${name}`;
      return fs.stat(entryPath).pipe(
        Effect.map((info) => ({ name, path: entryPath, isDirectory: info.type === "Directory" })),
        Effect.mapError((error) => FileError.fromSystemError("stat", entryPath, error))
      );
    });
  });
