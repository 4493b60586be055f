import { pino } from 'pino'

export const logger = pino({
  name: 'bootstrap-kit',
  level: process.env['LOG_LEVEL'] ?? 'info',
})
