import WebSocket from 'ws'
import { USER_AGENT } from '../../network/http-client'

/**
 * Callbacks of one socket connection
 */
export interface StreamSocketHandlers {
  onOpen(): void
  onMessage(text: string): void
  onPong(): void
  onClose(code: number, reason: string): void
  onError(error: Error): void
}

/**
 * The part of a WebSocket the streaming clients use
 */
export interface StreamSocket {
  send(data: string): void
  ping(): void
  /** Close handshake; the socket reports onClose when done */
  close(code?: number, reason?: string): void
  /** Drop the connection immediately */
  terminate(): void
}

/**
 * Opens a socket to `url` reporting to `handlers`
 */
export type SocketFactory = (url: string, handlers: StreamSocketHandlers) => StreamSocket

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8')
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }
  return Buffer.from(data).toString('utf8')
}

/**
 * StreamSocket on the ws package
 */
export class WsStreamSocket implements StreamSocket {
  private readonly ws: WebSocket

  constructor(url: string, handlers: StreamSocketHandlers) {
    this.ws = new WebSocket(url, { headers: { 'User-Agent': USER_AGENT } })

    this.ws.on('open', () => handlers.onOpen())
    this.ws.on('message', (data: WebSocket.RawData) => handlers.onMessage(rawDataToString(data)))
    this.ws.on('pong', () => handlers.onPong())
    this.ws.on('close', (code: number, reason: Buffer) => handlers.onClose(code, reason.toString()))
    this.ws.on('error', (error: Error) => handlers.onError(error))
  }

  send(data: string): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(data)
    }
  }

  ping(): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.ping()
    }
  }

  close(code = 1000, reason = 'Client disconnect'): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(code, reason)
    } else {
      this.ws.terminate()
    }
  }

  terminate(): void {
    this.ws.terminate()
  }
}

export const wsSocketFactory: SocketFactory = (url, handlers) => new WsStreamSocket(url, handlers)
