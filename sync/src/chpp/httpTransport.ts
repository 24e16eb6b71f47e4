/**
 * Minimal HTTP seam used for every CHPP call.
 * Production uses the global fetch; tests bind an in-process fake.
 */
import { NetworkException } from '@touchline/shared'
import { injectable } from 'inversify'

export interface HttpRequest {
    method: 'GET' | 'POST'
    url: string
    headers: Record<string, string>
    body?: string
}

export interface HttpResponse {
    status: number
    body: string
}

export interface IHttpTransport {
    /**
     * @throws NetworkException when no response was received
     */
    send(request: HttpRequest): Promise<HttpResponse>
}

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000

@injectable()
export class FetchHttpTransport implements IHttpTransport {
    constructor(private readonly timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS) {}

    async send(request: HttpRequest): Promise<HttpResponse> {
        try {
            const response = await fetch(request.url, {
                method: request.method,
                headers: request.headers,
                body: request.body,
                signal: AbortSignal.timeout(this.timeoutMs)
            })
            return { status: response.status, body: await response.text() }
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error)
            throw new NetworkException(`${request.method} ${stripQuery(request.url)} failed: ${reason}`, undefined, { cause: error })
        }
    }
}

function stripQuery(url: string): string {
    const q = url.indexOf('?')
    return q === -1 ? url : url.slice(0, q)
}
