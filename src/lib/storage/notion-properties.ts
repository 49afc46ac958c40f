import { z } from 'zod'
import { PropertyDecodeError, UnsupportedPropertyTypeError } from './errors.js'
import type { PropertyValue } from './types.js'

export type PropertyDecoder = (raw: Record<string, unknown>) => PropertyValue

const TextRuns = z.array(z.object({ plain_text: z.string() }))
const NamedOption = z.object({ name: z.string() }).nullish()

function field<T extends z.ZodTypeAny>(tag: string, schema: T, raw: Record<string, unknown>): z.output<T> {
  const parsed = schema.safeParse(raw[tag])
  if (!parsed.success) {
    throw new PropertyDecodeError(tag, parsed.error.issues.map(issue => issue.message).join('; '))
  }
  return parsed.data
}

function text(tag: string): PropertyDecoder {
  return raw => ({
    kind: 'string',
    value: (field(tag, TextRuns.nullish(), raw) ?? []).map(run => run.plain_text).join(''),
  })
}

function option(tag: string): PropertyDecoder {
  return raw => ({ kind: 'string', value: field(tag, NamedOption, raw)?.name ?? null })
}

function nullableString(tag: string): PropertyDecoder {
  return raw => ({ kind: 'string', value: field(tag, z.string().nullish(), raw) ?? null })
}

function timestamp(tag: string): PropertyDecoder {
  return raw => ({ kind: 'date', value: field(tag, z.string().nullish(), raw) ?? null })
}

const NotionFile = z.union([
  z.object({ type: z.literal('file'), file: z.object({ url: z.string() }) }),
  z.object({ type: z.literal('external'), external: z.object({ url: z.string() }) }),
])

/**
 * Dispatch table keyed by the Notion property type tag.
 * Property types missing here are rejected rather than guessed at.
 */
export const propertyDecoders: Readonly<Record<string, PropertyDecoder>> = {
  title: text('title'),
  rich_text: text('rich_text'),
  number: raw => ({ kind: 'number', value: field('number', z.number().nullish(), raw) ?? null }),
  select: option('select'),
  status: option('status'),
  multi_select: raw => ({
    kind: 'string-list',
    value: (field('multi_select', z.array(z.object({ name: z.string() })).nullish(), raw) ?? []).map(
      item => item.name
    ),
  }),
  // The start date is kept verbatim; timezone handling belongs to the caller
  date: raw => ({
    kind: 'date',
    value: field('date', z.object({ start: z.string() }).nullish(), raw)?.start ?? null,
  }),
  checkbox: raw => ({ kind: 'boolean', value: field('checkbox', z.boolean().nullish(), raw) ?? false }),
  url: nullableString('url'),
  email: nullableString('email'),
  phone_number: nullableString('phone_number'),
  created_time: timestamp('created_time'),
  last_edited_time: timestamp('last_edited_time'),
  files: raw => ({
    kind: 'string-list',
    value: (field('files', z.array(NotionFile).nullish(), raw) ?? []).map(item =>
      item.type === 'file' ? item.file.url : item.external.url
    ),
  }),
}

const RawProperty = z.object({ type: z.string() }).passthrough()

/**
 * Decode one Notion property value into a normalized PropertyValue
 */
export function decodeProperty(raw: unknown, propertyName?: string): PropertyValue {
  const parsed = RawProperty.safeParse(raw)
  if (!parsed.success) {
    throw new PropertyDecodeError('unknown', `property${propertyName ? ` "${propertyName}"` : ''} has no type tag`)
  }

  const tag = parsed.data.type
  const decoder = Object.hasOwn(propertyDecoders, tag) ? propertyDecoders[tag] : undefined
  if (!decoder) {
    throw new UnsupportedPropertyTypeError(tag, propertyName)
  }
  return decoder(parsed.data)
}

/**
 * Decode every property of a page, or only the named ones when a selection is given.
 * Selected names absent from the page are skipped so getProperty can report them.
 */
export function decodeProperties(
  properties: Record<string, unknown>,
  selection?: readonly string[]
): Record<string, PropertyValue> {
  const names = selection ?? Object.keys(properties)
  const decoded: Record<string, PropertyValue> = {}
  for (const name of names) {
    if (!Object.hasOwn(properties, name)) continue
    decoded[name] = decodeProperty(properties[name], name)
  }
  return decoded
}
