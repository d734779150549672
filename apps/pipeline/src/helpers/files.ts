import fs from 'fs-extra'
import path from 'path'

const makeDir = async (directory: string): Promise<string> => {
  await fs.ensureDir(directory)
  return directory
}

/** True when the path is a regular file with at least one byte. */
const isNonEmptyFile = async (file: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(file)
    return stat.isFile() && stat.size > 0
  } catch {
    return false
  }
}

/**
 * Recursively lists files under `dir` whose extension is in `extensions`,
 * sorted by path. A missing directory yields an empty list.
 */
const findFiles = async (
  dir: string,
  extensions: readonly string[]
): Promise<string[]> => {
  if (!(await fs.pathExists(dir))) {
    return []
  }
  const found: string[] = []
  const entries = await fs.readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    const full = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      found.push(...(await findFiles(full, extensions)))
    } else if (extensions.includes(path.extname(entry.name).toLowerCase())) {
      found.push(full)
    }
  }
  return found.sort()
}

/** Resolves an executable name against PATH, or checks an explicit path. */
const which = async (command: string): Promise<string | null> => {
  if (!command) {
    return null
  }
  const candidates = command.includes(path.sep)
    ? [command]
    : (process.env.PATH ?? '')
        .split(path.delimiter)
        .filter(Boolean)
        .map((dir) => path.join(dir, command))

  for (const candidate of candidates) {
    try {
      await fs.access(candidate, fs.constants.X_OK)
      return candidate
    } catch {
      continue
    }
  }
  return null
}

export { makeDir, isNonEmptyFile, findFiles, which }
