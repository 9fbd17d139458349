/**
 * Session Service
 *
 * Tracks whether the local user is signed in and notifies subscribers on
 * every change. The repost engine listens here to drop its cache on sign out.
 */

import { EventEmitter } from 'node:events'
import type {
  AuthStateSource,
  Unsubscribe,
} from '@root/types/reposts.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface SessionState {
  authenticated: boolean
  userPubkey: string | null
}

export class SessionService implements AuthStateSource {
  private readonly log: FastifyBaseLogger
  private readonly eventEmitter = new EventEmitter()
  private _isAuthenticated: boolean

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly userPubkey: string,
    startAuthenticated = true,
  ) {
    this.log = createServiceLogger(baseLog, 'SESSION')
    this._isAuthenticated = startAuthenticated
  }

  get isAuthenticated(): boolean {
    return this._isAuthenticated
  }

  get state(): SessionState {
    return {
      authenticated: this._isAuthenticated,
      userPubkey: this._isAuthenticated ? this.userPubkey : null,
    }
  }

  login(): SessionState {
    this.setAuthenticated(true)
    return this.state
  }

  logout(): SessionState {
    this.setAuthenticated(false)
    return this.state
  }

  /**
   * Listener receives the current state immediately, then every change.
   */
  subscribe(listener: (isAuthenticated: boolean) => void): Unsubscribe {
    listener(this._isAuthenticated)
    this.eventEmitter.on('change', listener)
    return () => {
      this.eventEmitter.off('change', listener)
    }
  }

  private setAuthenticated(isAuthenticated: boolean): void {
    if (isAuthenticated === this._isAuthenticated) return
    this._isAuthenticated = isAuthenticated
    this.log.info(
      { userPubkey: this.userPubkey },
      isAuthenticated ? 'Signed in' : 'Signed out',
    )
    this.eventEmitter.emit('change', isAuthenticated)
  }
}
