/**
 * File writing operations using Effect Platform
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { dirname } from "node:path";
import { FileError } from "../errors";

/**
 * Create a directory and its parents if missing
 */
export const ensureDirectory = (
  path: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .makeDirectory(path, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path, error)));
  });

/**
 * Write string to file, replacing any previous content
 *
 * Parent directories are created as needed.
 */
export const writeString = (
  path: string,
  content: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* ensureDirectory(dirname(path));
    yield* fs
      .writeFileString(path, content)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
  });
