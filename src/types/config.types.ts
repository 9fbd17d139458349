export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  dbPath: string
  rateLimitMax: number
  // Relay Gateway Config
  gatewayUrl: string
  gatewayApiKey: string
  gatewayTimeoutMs: number
  // Session Config
  userPubkey: string
  startAuthenticated: boolean
  // Repost Config
  repostFetchLimit: number
  repostTargetKind: number
}
