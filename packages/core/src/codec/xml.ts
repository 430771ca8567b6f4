/**
 * Shared XML builder/parser for portal documents
 */
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser'
import type { z } from 'zod'
import { MalformedResponseError, Result } from '../types/error.types.js'

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>'

const builder = new XMLBuilder({
  format: false,
  suppressEmptyNode: false,
})

const parser = new XMLParser({
  ignoreDeclaration: true,
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: false,
})

/**
 * Serialize `elements` under a single root element, in insertion order
 */
export function buildDocument(root: string, elements: Record<string, string>): string {
  return XML_DECLARATION + builder.build({ [root]: elements })
}

/**
 * Parse `xml`, take the children of `root` and validate them with `schema`
 */
export function readDocument<S extends z.ZodTypeAny>(
  xml: string,
  root: string,
  schema: S
): Result<z.output<S>, MalformedResponseError> {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    return Result.error(
      new MalformedResponseError(`invalid XML: ${validation.err.msg}`, {
        line: validation.err.line,
      })
    )
  }

  const parsed: unknown = parser.parse(xml)
  const body = isRecord(parsed) ? parsed[root] : undefined
  if (body === undefined) {
    return Result.error(new MalformedResponseError(`missing <${root}> element`))
  }

  // <root/> parses to an empty string
  const result = schema.safeParse(isRecord(body) ? body : {})
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` <${issue.path.join('/')}>` : ''
    return Result.error(
      new MalformedResponseError(`malformed <${root}>${where}: ${issue?.message ?? 'invalid'}`, {
        issues: result.error.issues,
      })
    )
  }

  return Result.ok(result.data)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
