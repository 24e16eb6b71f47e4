/**
 * XML → typed record decoding for CHPP documents.
 *
 * fast-xml-parser produces a plain tree (all tag values as strings); the Zod schemas in
 * @touchline/shared validate and convert it. A document carrying an ErrorCode element
 * decodes to a ChppApiException instead.
 */
import { ChppApiException, ErrorDocumentSchema, ParseException } from '@touchline/shared'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import type { z } from 'zod'

// Repeating elements; the schemas also accept a lone element for these paths.
const ARRAY_PATHS = new Set(['HattrickData.Teams.Team', 'HattrickData.Team.PlayerList.Player', 'HattrickData.LeagueList.League'])

const parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: true,
    isArray: (_tagName: string, jPath: string) => ARRAY_PATHS.has(jPath)
})

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .slice(0, 5)
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ')
}

/**
 * Parse XML into a plain tree.
 * @throws ParseException when the body is not well-formed XML
 */
export function parseChppXml(xml: string, document: string): unknown {
    const validation = XMLValidator.validate(xml)
    if (validation !== true) {
        throw new ParseException(`Malformed ${document} response: ${validation.err.msg} (line ${validation.err.line})`, document)
    }
    return parser.parse(xml)
}

/**
 * Returns the CHPP error carried by the tree, or null when the tree is a regular document.
 */
export function extractChppError(tree: unknown, document: string): ChppApiException | null {
    if (!isRecord(tree) || !isRecord(tree.HattrickData) || tree.HattrickData.ErrorCode === undefined) {
        return null
    }
    const parsed = ErrorDocumentSchema.safeParse(tree)
    if (!parsed.success) {
        throw new ParseException(`Unreadable ${document} error document: ${formatIssues(parsed.error)}`, document)
    }
    const e = parsed.data
    return new ChppApiException(e.error, e.errorCode, e.errorGuid, e.request, e.lineNumber)
}

/**
 * Decode a CHPP response body.
 * @throws ChppApiException for error documents, ParseException for anything unexpected
 */
export function decodeChppDocument<T>(xml: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, document: string): T {
    const tree = parseChppXml(xml, document)
    const apiError = extractChppError(tree, document)
    if (apiError) {
        throw apiError
    }
    const result = schema.safeParse(tree)
    if (!result.success) {
        throw new ParseException(`Unexpected ${document} document: ${formatIssues(result.error)}`, document)
    }
    return result.data
}

/** Like extractChppError but tolerant of non-XML bodies (HTML error pages). */
export function tryExtractChppError(body: string, document: string): ChppApiException | null {
    if (XMLValidator.validate(body) !== true) return null
    try {
        return extractChppError(parser.parse(body), document)
    } catch (error) {
        if (error instanceof ParseException) return null
        throw error
    }
}
