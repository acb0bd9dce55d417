import './env'
import fs from 'fs'
import { initSentry } from './lib/sentry'

initSentry()
import { createApp } from './app'
import { loadConfig, ConfigError, type AppConfig } from './config'
import { getLogger, errorMessage } from './lib/logger'
import { BlogPostGenerator } from './services/blogGenerator'
import { createContentModel } from './services/contentModel'
import { BlogPipeline } from './services/pipeline'
import { DailyPostScheduler } from './workers/dailyScheduler'

const log = getLogger('api')

function loadConfigOrExit(): Readonly<AppConfig> {
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal({ msg: err.message })
      process.exit(1)
    }
    throw err
  }
}

function main(): void {
  const config = loadConfigOrExit()

  const generator = new BlogPostGenerator({ model: createContentModel(config) })
  if (!generator.hasModel) {
    log.warn({ msg: 'OPENAI_API_KEY not set; posts will use the fallback template' })
  }

  const pipeline = new BlogPipeline({
    generator,
    dirs: { generated: config.generatedPostsDir, daily: config.dailyPostsDir },
    dailyKeyword: config.dailyKeyword,
    seo: { mockDataFile: config.mockSeoDataFile },
  })
  const scheduler = new DailyPostScheduler((jobLog) => pipeline.generateDaily(jobLog), {
    hour: config.dailyHour,
    minute: config.dailyMinute,
  })

  fs.mkdirSync(config.generatedPostsDir, { recursive: true })
  fs.mkdirSync(config.dailyPostsDir, { recursive: true })

  const app = createApp({ config, pipeline, scheduler })
  const port = config.port

  const server = app.listen(port, () => {
    log.info({ msg: 'Server listening', port, debug: config.debug })
    if (config.schedulerEnabled) {
      scheduler.start()
    } else {
      log.info({ msg: 'Scheduler disabled (DISABLE_SCHEDULER=true)' })
    }
  })

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      log.fatal({ msg: `Port ${port} is already in use; change PORT in your .env file`, port })
    } else {
      log.fatal({ msg: 'Server error', error: errorMessage(error) })
    }
    process.exit(1)
  })

  function shutdown(signal: string) {
    log.info({ msg: `${signal} received, shutting down gracefully` })
    scheduler.stop()
    server.close(() => {
      log.info({ msg: 'Server closed' })
      process.exit(0)
    })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

main()
