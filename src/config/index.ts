import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
export const ENV_PATH = path.resolve(__dirname, '..', '..', '.env')

dotenv.config({ path: ENV_PATH })

export const APP_NAME = 'blogger-linked-images'
export const APP_VERSION = '0.1.0'

export interface AppConfig {
  bloggerApiBase: string
  logLevel: string
  requestTimeoutMs: number
  userAgent: string
}

function getEnvInt(name: string, defaultValue: number): number {
  const value = process.env[name]
  if (!value) return defaultValue
  const parsed = parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

function loadConfigFromEnv(): AppConfig {
  return {
    bloggerApiBase: process.env.BLOGGER_API_BASE || 'https://www.googleapis.com/blogger/v3',
    logLevel: process.env.LOG_LEVEL || 'info',
    requestTimeoutMs: getEnvInt('REQUEST_TIMEOUT_MS', 30000),
    userAgent: process.env.USER_AGENT || `${APP_NAME}/${APP_VERSION}`,
  }
}

export const config: AppConfig = loadConfigFromEnv()
