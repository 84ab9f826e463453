import { loadConfig } from '../api/config.ts'
import { createHttpService } from '../api/http/httpService.ts'
import { TranscriptService } from '../api/service/TranscriptService.ts'
import { TranscriptStore } from '../api/service/TranscriptStore.ts'
import { errorContext, logger } from '../api/utils/logger.ts'
import { createShutdownManager } from '../api/utils/shutdown.ts'

const config = loadConfig()

const store = config.persist ? new TranscriptStore(config.workspace) : null
const service = new TranscriptService(store)
const httpService = createHttpService(service, { port: config.port, corsOrigin: config.corsOrigin })

const shutdown = createShutdownManager()
if (store) shutdown.register('store', () => store.close())
shutdown.register('http', () => httpService.stop())
shutdown.installSignalHandlers()

httpService.start().then(() => {
  logger.info('Server started', {
    port: httpService.port,
    workspace: config.persist ? config.workspace : null,
    patterns: service.patternCount,
    nodeVersion: process.version,
  })
}).catch((err: unknown) => {
  logger.error('Server failed to start', errorContext(err))
  process.exit(1)
})
