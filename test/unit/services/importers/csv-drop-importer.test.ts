import { readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { WatchRecord } from '@root/types/history.types.js'
import {
  CsvDropImporter,
  dropFileName,
} from '@services/importers/csv-drop-importer.js'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createTempDir } from '../../../helpers/app.js'
import { createMockLogger } from '../../../mocks/logger.js'

const record: WatchRecord = {
  externalId: 'tt1',
  title: 'Heat',
  year: 1995,
  rating: 4,
  watchedAt: '2024-06-01T20:00:00.000Z',
  isRewatch: false,
}

const now = () => new Date('2024-01-02T03:04:05.678Z')

describe('CsvDropImporter', () => {
  let dir: string

  beforeEach(async () => {
    dir = await createTempDir('csv-drop-')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('names drop files after the run time', () => {
    expect(dropFileName(now())).toBe('letterboxd-import-20240102T030405Z.csv')
  })

  it('writes a Letterboxd import file and accepts every record', async () => {
    const importer = new CsvDropImporter(createMockLogger(), dir, now)

    const results = await importer.importRecords([record])

    expect(results).toEqual([
      { externalId: 'tt1', watchedAt: '2024-06-01T20:00:00.000Z', success: true },
    ])
    expect(
      await readFile(join(dir, 'letterboxd-import-20240102T030405Z.csv'), 'utf-8'),
    ).toBe(
      'Title,Year,Rating,Rewatch,imdbID,WatchedDate\nHeat,1995,4,false,tt1,2024-06-01\n',
    )
  })

  it('writes nothing when there is nothing to import', async () => {
    const importer = new CsvDropImporter(createMockLogger(), join(dir, 'unused'), now)
    await expect(importer.importRecords([])).resolves.toEqual([])
  })

  it('fails every record when the file cannot be written', async () => {
    const blocker = join(dir, 'blocker')
    await writeFile(blocker, '')
    const log = createMockLogger()
    const importer = new CsvDropImporter(log, join(blocker, 'imports'), now)

    const results = await importer.importRecords([record])

    expect(results).toHaveLength(1)
    expect(results[0]).toMatchObject({ externalId: 'tt1', success: false })
    expect(results[0]?.error).toEqual(expect.any(String))
    expect(log.error).toHaveBeenCalled()
  })
})
