/**
 * Tests for WebSocket protocol message parsing and serialization.
 */

import { describe, it, expect } from 'vitest'
import {
  parseClientMessage,
  parseCompetitionPath,
  serializeServerMessage,
  type ServerMessage,
} from '../../src/infrastructure/servers/ws/protocol.js'

describe('WS Protocol', () => {
  describe('parseClientMessage', () => {
    it('parses ping message', () => {
      expect(parseClientMessage('{"type":"ping"}')).toEqual({ type: 'ping' })
    })

    it('parses refresh message', () => {
      expect(parseClientMessage('{"type":"refresh"}')).toEqual({ type: 'refresh' })
    })

    it('rejects unknown type', () => {
      expect(() => parseClientMessage(JSON.stringify({ type: 'unknown' }))).toThrow()
    })

    it('rejects malformed JSON', () => {
      expect(() => parseClientMessage('not json')).toThrow()
    })
  })

  describe('serializeServerMessage', () => {
    it('serializes a leaderboard update', () => {
      const msg: ServerMessage = { type: 'leaderboard_update', data: [], timestamp: '2026-03-01T12:00:00.000Z' }
      expect(serializeServerMessage(msg)).toBe(
        '{"type":"leaderboard_update","data":[],"timestamp":"2026-03-01T12:00:00.000Z"}',
      )
    })

    it('serializes an error', () => {
      const msg: ServerMessage = { type: 'error', code: 'INVALID_MESSAGE', message: 'Malformed message' }
      expect(JSON.parse(serializeServerMessage(msg))).toEqual(msg)
    })
  })

  describe('parseCompetitionPath', () => {
    it('extracts the competition id', () => {
      expect(parseCompetitionPath('/ws/competitions/H1')).toBe('H1')
      expect(parseCompetitionPath('/ws/competitions/H1/')).toBe('H1')
    })

    it('decodes percent-encoded ids', () => {
      expect(parseCompetitionPath('/ws/competitions/spring%20jam')).toBe('spring jam')
    })

    it('rejects other paths', () => {
      expect(parseCompetitionPath('/ws/competitions/')).toBeNull()
      expect(parseCompetitionPath('/ws/competitions/H1/extra')).toBeNull()
      expect(parseCompetitionPath('/ws/events')).toBeNull()
    })

    it('rejects blank and undecodable ids', () => {
      expect(parseCompetitionPath('/ws/competitions/%20')).toBeNull()
      expect(parseCompetitionPath('/ws/competitions/%E0%A4%A')).toBeNull()
    })
  })
})
