import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/**
 * Replace a file so readers see either the old or the new content, never a
 * partial write: the data goes to a temporary sibling that is renamed over
 * the target.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
): Promise<void> {
  const directory = dirname(filePath)
  await mkdir(directory, { recursive: true })

  const tempPath = join(
    directory,
    `.${basename(filePath)}.${process.pid}.${Date.now()}.tmp`,
  )

  try {
    await writeFile(tempPath, content, 'utf-8')
    await rename(tempPath, filePath)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}
