/**
 * Directory driver
 * Walks a source tree and assembles one Contract per matching file
 */

import fs from 'fs-extra'
import path from 'node:path'
import type { Contract } from '@vydoc/core'
import { parseContract } from './assembler.js'
import { InvalidSourceDirectoryError } from './errors.js'
import type { ParseOptions } from './types.js'

export const DEFAULT_EXTENSIONS = ['.vy']

/**
 * List matching files in traversal order: a directory's files as `readdir`
 * returns them, then each subdirectory in turn. No sorting is applied.
 */
export async function findSourceFiles(directory: string, extensions: string[] = DEFAULT_EXTENSIONS): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true })
  const files: string[] = []
  const subdirectories: string[] = []

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name)
    if (entry.isDirectory()) {
      subdirectories.push(fullPath)
    } else if (entry.isFile() && extensions.includes(path.extname(entry.name))) {
      files.push(fullPath)
    }
  }

  for (const subdirectory of subdirectories) {
    files.push(...(await findSourceFiles(subdirectory, extensions)))
  }

  return files
}

/**
 * Parse every contract under a directory
 *
 * @throws InvalidSourceDirectoryError if the directory is missing or not a directory
 */
export async function parseContracts(sourceDir: string, options: ParseOptions = {}): Promise<Contract[]> {
  const root = path.resolve(sourceDir)

  let isDirectory: boolean
  try {
    isDirectory = (await fs.stat(root)).isDirectory()
  } catch (error) {
    throw new InvalidSourceDirectoryError(sourceDir, { cause: error })
  }
  if (!isDirectory) {
    throw new InvalidSourceDirectoryError(sourceDir)
  }

  const files = await findSourceFiles(root, options.extensions ?? DEFAULT_EXTENSIONS)

  // Files are independent; Promise.all keeps traversal order
  return Promise.all(
    files.map(async (file) => parseContract(await fs.readFile(file, 'utf-8'), path.relative(root, file), options))
  )
}
