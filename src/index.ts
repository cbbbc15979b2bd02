import path from 'node:path'
import { createApp } from '@/api/server'
import { createFileStorage } from '@/common/infrastructure/storage'
import { loadConfigOrDefaults } from '@/bounded-contexts/configuration/application/loadConfigWorkflow'
import { fromFalsy, fromNullable, flatMap, getOrElse } from '@/common/types/option'

const envOr = (name: string, defaultValue: string): string =>
  getOrElse(defaultValue)(flatMap((value: string) => fromFalsy(value))(fromNullable(process.env[name])))

const main = async () => {
  const configPath = envOr('CONFIG_PATH', 'app.conf')
  const dataDir = envOr('DATA_DIR', 'data')

  const configFile = path.resolve(configPath)
  const config = await loadConfigOrDefaults(createFileStorage(path.dirname(configFile)))(path.basename(configFile))
  const app = createApp(createFileStorage(dataDir))

  app.listen(config.port, config.host, () => {
    console.log(`Server on ${config.host}:${config.port}${config.debug ? ' (debug)' : ''}`)
  })
}

main().catch(error => {
  console.error('Failed to start server', error)
  process.exit(1)
})
