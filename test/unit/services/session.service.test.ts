import { SessionService } from '@services/session.service.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('SessionService', () => {
  it('should expose the user pubkey only while signed in', () => {
    const session = new SessionService(createMockLogger(), 'test-user-pubkey')

    expect(session.state).toEqual({
      authenticated: true,
      userPubkey: 'test-user-pubkey',
    })
    expect(session.logout()).toEqual({ authenticated: false, userPubkey: null })
    expect(session.login()).toEqual({
      authenticated: true,
      userPubkey: 'test-user-pubkey',
    })
  })

  it('should start signed out when asked to', () => {
    const session = new SessionService(
      createMockLogger(),
      'test-user-pubkey',
      false,
    )

    expect(session.isAuthenticated).toBe(false)
  })

  it('should emit the current state and then only transitions', () => {
    const session = new SessionService(createMockLogger(), 'test-user-pubkey')
    const listener = vi.fn()

    session.subscribe(listener)
    session.login()
    session.logout()
    session.logout()
    session.login()

    expect(listener.mock.calls).toEqual([[true], [false], [true]])
  })

  it('should stop notifying after unsubscribe', () => {
    const session = new SessionService(createMockLogger(), 'test-user-pubkey')
    const listener = vi.fn()

    const unsubscribe = session.subscribe(listener)
    unsubscribe()
    session.logout()

    expect(listener).toHaveBeenCalledTimes(1)
  })
})
