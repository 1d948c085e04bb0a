/**
 * Snapshot Writer
 *
 * Replaces the state file in one step: exclusive advisory lock, write to a
 * sibling temp file, fsync, rename over the target. Readers only ever see the
 * previous or the next full snapshot.
 */
import { mkdir, open, rename } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { FastifyBaseLogger } from 'fastify'
import lockfile from 'proper-lockfile'

/** Lock files older than this are considered abandoned by a dead process */
const LOCK_STALE_MS = 30_000

export type SnapshotWriteResult = 'written' | 'locked'

/**
 * Raised when the snapshot could not be written or moved into place.
 */
export class SnapshotWriteError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'SnapshotWriteError'
  }
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

/**
 * Writes `contents` to `path` atomically.
 *
 * @returns `'locked'` without touching the file when another writer holds the
 * lock, `'written'` once the new snapshot is in place
 * @throws {SnapshotWriteError} on any filesystem failure
 */
export async function writeSnapshotAtomic(
  path: string,
  contents: string,
  log: FastifyBaseLogger,
): Promise<SnapshotWriteResult> {
  const tmpPath = `${path}.tmp`

  let release: () => Promise<void>
  try {
    await mkdir(dirname(path), { recursive: true })
    release = await lockfile.lock(path, {
      realpath: false,
      retries: 0,
      stale: LOCK_STALE_MS,
      onCompromised: (error) => {
        log.warn({ error }, `State file lock for ${path} was compromised`)
      },
    })
  } catch (error) {
    if (isErrnoCode(error, 'ELOCKED')) {
      return 'locked'
    }
    throw new SnapshotWriteError(`Failed to lock ${path}`, path, {
      cause: error,
    })
  }

  try {
    const handle = await open(tmpPath, 'w')
    try {
      await handle.writeFile(contents, 'utf8')
      await handle.sync()
    } finally {
      await handle.close()
    }
    await rename(tmpPath, path)
    return 'written'
  } catch (error) {
    throw new SnapshotWriteError(`Failed to write ${path}`, path, {
      cause: error,
    })
  } finally {
    try {
      await release()
    } catch (error) {
      log.warn({ error }, `Failed to release state file lock for ${path}`)
    }
  }
}
