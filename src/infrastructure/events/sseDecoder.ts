/**
 * Incremental Server-Sent Events decoder.
 *
 * Feed it text chunks as they arrive; it returns the frames completed by each
 * chunk. Multi-line `data:` fields are joined with "\n", comment lines are
 * skipped, and a frame still pending when the stream ends is flushed by `end()`.
 * The last event ID carries over to later frames until another `id:` line
 * replaces it.
 */

import type { EventStreamFrame } from '../../core/ports/eventStream.js'

export class SseDecoder {
  #buffer = ''
  #data: string[] = []
  #event: string | undefined
  #id: string | undefined

  push(chunk: string): EventStreamFrame[] {
    this.#buffer += chunk
    const frames: EventStreamFrame[] = []

    let newline = this.#buffer.indexOf('\n')
    while (newline !== -1) {
      const line = this.#buffer.slice(0, newline).replace(/\r$/, '')
      this.#buffer = this.#buffer.slice(newline + 1)
      const frame = this.#processLine(line)
      if (frame) frames.push(frame)
      newline = this.#buffer.indexOf('\n')
    }

    return frames
  }

  end(): EventStreamFrame[] {
    const frames: EventStreamFrame[] = []
    if (this.#buffer.length > 0) {
      const frame = this.#processLine(this.#buffer.replace(/\r$/, ''))
      this.#buffer = ''
      if (frame) frames.push(frame)
    }
    const pending = this.#dispatch()
    if (pending) frames.push(pending)
    return frames
  }

  #processLine(line: string): EventStreamFrame | undefined {
    if (line === '') return this.#dispatch()
    if (line.startsWith(':')) return undefined

    const colon = line.indexOf(':')
    const field = colon === -1 ? line : line.slice(0, colon)
    let value = colon === -1 ? '' : line.slice(colon + 1)
    if (value.startsWith(' ')) value = value.slice(1)

    switch (field) {
      case 'data':
        this.#data.push(value)
        break
      case 'event':
        this.#event = value
        break
      case 'id':
        if (!value.includes('\0')) this.#id = value
        break
    }
    return undefined
  }

  #dispatch(): EventStreamFrame | undefined {
    if (this.#data.length === 0) {
      this.#event = undefined
      return undefined
    }
    const frame: EventStreamFrame = {
      id: this.#id,
      event: this.#event ?? 'message',
      data: this.#data.join('\n'),
    }
    this.#data = []
    this.#event = undefined
    return frame
  }
}
