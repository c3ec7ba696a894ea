/**
 * Remote fetch transport
 *
 * The catalog reads the release listing as text and the installer streams
 * source tarballs. Both go through this interface so tests can substitute an
 * in-process implementation.
 */

import { Readable } from 'stream'
import { createFetchFailedError } from './error-handler'

export interface Fetcher {
  fetchText(url: string): Promise<string>
  fetchStream(url: string): Promise<Readable>
}

/**
 * Fetcher backed by the global fetch API.
 *
 * The timeout covers the wait for response headers only; a large body is
 * allowed to take as long as it needs.
 */
export class HttpFetcher implements Fetcher {
  constructor(private readonly timeoutMs: number) {}

  async fetchText(url: string): Promise<string> {
    const response = await this.request(url)
    try {
      return await response.text()
    } catch (error) {
      throw createFetchFailedError(url, error)
    }
  }

  async fetchStream(url: string): Promise<Readable> {
    const response = await this.request(url)
    if (!response.body) {
      throw createFetchFailedError(
        url,
        `response has no body (status ${response.status})`,
      )
    }
    // Convert WHATWG ReadableStream to Node.js Readable
    return Readable.fromWeb(response.body)
  }

  private async request(url: string): Promise<Response> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    let response: Response
    try {
      response = await fetch(url, { signal: controller.signal })
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw createFetchFailedError(
          url,
          `no response after ${Math.round(this.timeoutMs / 1000)}s`,
        )
      }
      throw createFetchFailedError(url, error)
    } finally {
      clearTimeout(timeoutId)
    }

    if (!response.ok) {
      throw createFetchFailedError(
        url,
        `HTTP ${response.status} ${response.statusText}`,
      )
    }
    return response
  }
}

