import { describe, it, expect } from 'vitest'
import request from 'supertest'
import { createApp } from '@/api/server'
import { createInMemoryStorage } from '@/common/infrastructure/storage'

describe('Configuration Context: API Routes (Integration)', () => {
  const app = createApp(createInMemoryStorage({
    'app.conf': 'debug=true\nport=3000\nhost=0.0.0.0',
    'partial.conf': 'debug=notabool\ngarbage-line\nport=3000',
    'bad.conf': 'port=notanumber',
  }))

  it('returns a loaded config', async () => {
    const response = await request(app).get('/api/configuration/files/app.conf').expect(200)
    expect(response.body).toEqual({ config: { debug: true, port: 3000, host: '0.0.0.0' } })
  })

  it('returns defaults for tolerated fields', async () => {
    const response = await request(app).get('/api/configuration/files/partial.conf').expect(200)
    expect(response.body).toEqual({ config: { debug: false, port: 3000, host: 'localhost' } })
  })

  it('rejects an invalid port', async () => {
    const response = await request(app).get('/api/configuration/files/bad.conf').expect(400)
    expect(response.body.error).toEqual({
      type: 'Parse',
      reason: 'InvalidDigit',
      input: 'notanumber',
      message: 'invalid digit found in string',
      description: 'Parse error: invalid digit found in string',
    })
  })

  it('returns 404 for a missing file', async () => {
    const response = await request(app).get('/api/configuration/files/missing.conf').expect(404)
    expect(response.body.error.message).toBe("ENOENT: no such file or directory, open 'missing.conf'")
  })
})
