import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const projectRoot = resolve(__dirname, '..', '..')

/**
 * Resolves the data directory based on platform and environment.
 *
 * Priority:
 * 1. process.env.dataDir (explicit override, used by the Docker image)
 * 2. Windows: %PROGRAMDATA%\ListeningSync
 * 3. macOS: ~/.config/ListeningSync
 * 4. Linux: null (use project-relative paths)
 */
export function resolveDataDir(): string | null {
  if (process.env.dataDir) {
    return process.env.dataDir
  }

  if (process.platform === 'win32') {
    const programData = process.env.PROGRAMDATA || process.env.ALLUSERSPROFILE
    if (programData) {
      return resolve(programData, 'ListeningSync')
    }
  }

  if (process.platform === 'darwin') {
    const home = process.env.HOME
    if (home) {
      return resolve(home, '.config', 'ListeningSync')
    }
  }

  return null
}

/**
 * Resolves the default sync state snapshot path.
 * With a data dir: {dataDir}/state.json
 * Without: {projectRoot}/data/state.json
 */
export function resolveStatePath(): string {
  const dataDir = resolveDataDir()
  return dataDir
    ? resolve(dataDir, 'state.json')
    : resolve(projectRoot, 'data', 'state.json')
}

/**
 * Resolves the log directory path.
 * With a data dir: {dataDir}/logs
 * Without: {projectRoot}/data/logs
 */
export function resolveLogPath(): string {
  const dataDir = resolveDataDir()
  return dataDir
    ? resolve(dataDir, 'logs')
    : resolve(projectRoot, 'data', 'logs')
}

/**
 * Resolves the .env file path.
 * With a data dir: {dataDir}/.env
 * Without: {projectRoot}/.env
 */
export function resolveEnvPath(): string {
  const dataDir = resolveDataDir()
  return dataDir ? resolve(dataDir, '.env') : resolve(projectRoot, '.env')
}
