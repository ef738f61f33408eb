import { FetchError } from './errors'

export interface HttpOptions {
  userAgent: string
  timeoutMs: number
  fetchImpl?: typeof fetch
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function requestInit({ userAgent, timeoutMs }: HttpOptions, accept: string): RequestInit {
  return {
    headers: {
      Accept: accept,
      'User-Agent': userAgent,
    },
    signal: AbortSignal.timeout(timeoutMs),
  }
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
}

/**
 * Fetch an HTML page. Any non-2xx status or transport failure becomes a `FetchError`.
 */
export async function fetchPage(url: string, options: HttpOptions): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch

  let response: Response
  try {
    response = await fetchImpl(url, requestInit(options, 'text/html'))
  } catch (error) {
    throw new FetchError(url, null, { cause: error })
  }

  if (!response.ok) {
    throw new FetchError(url, response.status)
  }

  try {
    return await response.text()
  } catch (error) {
    throw new FetchError(url, null, { cause: error })
  }
}
