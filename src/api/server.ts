import express from 'express'
import { Storage } from '@/common/infrastructure/storage'
import { arithmeticRoutes } from './routes/arithmetic'
import { configurationRoutes } from './routes/configuration'

/**
 * Builds the HTTP application over the given storage. Listening is left to
 * the caller so tests can drive the app in-process.
 */
export const createApp = (storage: Storage) => {
  const app = express()
  // Register context-specific routes
  app.use('/api/arithmetic', arithmeticRoutes(storage))
  app.use('/api/configuration', configurationRoutes(storage))

  app.get('/health', (req, res) => {
    res.json({ status: 'ok' })
  })

  return app
}
