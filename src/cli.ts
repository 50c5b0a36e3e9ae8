#!/usr/bin/env node
import { Command } from 'commander'
import { APP_VERSION } from '@utils/version.js'
import { createApp, startServer } from './server.js'

const program = new Command()

program
  .name('trakt-letterboxd-sync')
  .description('Sync Trakt movie watch history into Letterboxd imports')
  .version(APP_VERSION)

program
  .command('run')
  .description('Run one history sync and exit')
  .option('--scale <max>', 'destination rating scale maximum (overrides ratingScaleMax)')
  .action(async (opts: { scale?: string }) => {
    if (opts.scale !== undefined) {
      process.env.ratingScaleMax = opts.scale
    }
    // The scheduler only starts from the server's onReady hook when enabled
    process.env.scheduledSync = 'false'

    const app = await createApp()
    try {
      const result = await app.historySync.run()
      app.log.info(
        { newRecords: result.newRecords, status: result.status },
        `Sync ${result.status}: ${result.newRecords} new records written to ${result.exportPath ?? 'nowhere'}`,
      )
      process.exitCode = result.status === 'success' ? 0 : 1
    } catch (error) {
      app.log.error({ error }, 'Sync run failed')
      process.exitCode = 1
    } finally {
      await app.close()
    }
  })

program
  .command('serve', { isDefault: true })
  .description('Start the HTTP service and the optional scheduled sync')
  .action(async () => {
    await startServer()
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
