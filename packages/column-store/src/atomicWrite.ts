/**
 * Write-then-rename so readers never observe a half-written file.
 */

import { randomUUID } from 'node:crypto'
import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { CatalogWriteError } from '@barvault/contracts'

export const TEMP_SUFFIX = '.tmp'

export async function writeFileAtomic(filePath: string, contents: string | Uint8Array): Promise<void> {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}${TEMP_SUFFIX}`)
  try {
    await mkdir(path.dirname(filePath), { recursive: true })
    await writeFile(tempPath, contents)
    await rename(tempPath, filePath)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw new CatalogWriteError(
      `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: filePath },
      { cause: error }
    )
  }
}
