import type { HttpRequest, HttpResponse, IHttpTransport } from '../../src/chpp/httpTransport.js'

export type FakeResponder = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>

/**
 * In-process HTTP transport. Records every request and answers through the responder.
 */
export class FakeHttpTransport implements IHttpTransport {
    public readonly requests: HttpRequest[] = []

    constructor(private responder: FakeResponder = () => ({ status: 200, body: '' })) {}

    respondWith(responder: FakeResponder): void {
        this.responder = responder
    }

    async send(request: HttpRequest): Promise<HttpResponse> {
        this.requests.push(request)
        return this.responder(request)
    }

    /** `file` query parameter of each recorded request, in order */
    files(): string[] {
        return this.requests.map((r) => new URL(r.url).searchParams.get('file') ?? '')
    }
}

/** Query parameter of a request URL, or null */
export function queryParam(request: HttpRequest, name: string): string | null {
    return new URL(request.url).searchParams.get(name)
}
