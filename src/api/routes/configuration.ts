import { Router } from 'express'
import { Storage } from '@/common/infrastructure/storage'
import { sendErrorResponse, wrapAsyncRoute } from '@/common/infrastructure/errorMapper'
import { loadConfigWorkflow } from '@/bounded-contexts/configuration/application/loadConfigWorkflow'

export const configurationRoutes = (storage: Storage): Router => {
  const router = Router()
  const loadConfig = loadConfigWorkflow(storage)

  /**
   * GET /api/configuration/files/:name
   * Loads a stored key=value config file.
   *
   * Responses:
   * - 200: { config }
   * - 400: port is not an unsigned 16-bit integer
   * - 404: File not found
   */
  router.get('/files/:name', wrapAsyncRoute(async (req, res) => {
    const result = await loadConfig(req.params.name)

    if (result.isSuccess) {
      res.json({ config: result.value })
    } else {
      sendErrorResponse(res, result.error)
    }
  }))

  return router
}
