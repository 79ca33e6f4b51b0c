/**
 * AvailRQ document adapter.
 * Turns an XML request (or its JSON encoding) into an AvailRequestDocument;
 * no business rule is applied here.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z, ZodError } from 'zod';
import { AvailDocumentError } from '../infra/error.js';
import type { AvailRequestDocument, AvailRoomDocument, AvailDestination } from './availTypes.js';

// Elements that may repeat; always parsed as arrays so one occurrence looks like many
const ARRAY_PATHS = new Set([
  'AvailRQ.AvailDestinations',
  'AvailRQ.Paxes',
  'AvailRQ.Paxes.Pax',
  'AvailRQ.Configuration.Parameters.Parameter',
]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_name, jPath) => ARRAY_PATHS.has(jPath),
});

// An element with neither children nor attributes parses to ""
function emptyable<T extends z.ZodTypeAny>(schema: T) {
  return z.union([z.literal(''), schema]).optional();
}

const leaf = z.string().optional();

const parameterSchema = emptyable(
  z.object({
    '@_username': z.string().optional(),
    '@_password': z.string().optional(),
    '@_CompanyID': z.string().optional(),
  })
);

// Either bare text or an attribute object; with both, the text lands under "#text"
const destinationSchema = z.union([
  z.string(),
  z.object({ '@_code': z.string().optional(), '#text': z.string().optional() }),
]);

const paxSchema = z.union([
  z.string(),
  z.object({ '@_age': z.string().optional(), '#text': z.string().optional() }),
]);

const xmlRequestSchema = z.object({
  timeoutMilliseconds: leaf,
  source: emptyable(z.object({ languageCode: leaf })),
  optionsQuota: leaf,
  Configuration: emptyable(
    z.object({
      Parameters: emptyable(z.object({ Parameter: z.array(parameterSchema).optional() })),
    })
  ),
  SearchType: leaf,
  StartDate: leaf,
  EndDate: leaf,
  Currency: leaf,
  Nationality: leaf,
  Market: leaf,
  AvailDestinations: z.array(destinationSchema).optional(),
  Paxes: z.array(emptyable(z.object({ Pax: z.array(paxSchema).optional() }))).optional(),
});

type XmlRequest = z.infer<typeof xmlRequestSchema>;

function present(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function fromXmlTree(root: XmlRequest): AvailRequestDocument {
  const parameters = root.Configuration ? root.Configuration.Parameters : undefined;
  const first = parameters ? parameters.Parameter?.[0] : undefined;

  const destinations: AvailDestination[] = (root.AvailDestinations ?? []).map((d) =>
    typeof d === 'string' ? { code: present(d) } : { code: present(d['@_code']) ?? present(d['#text']) }
  );

  const rooms: AvailRoomDocument[] = (root.Paxes ?? []).map((block) => ({
    paxes: (block ? block.Pax ?? [] : []).map((pax) =>
      typeof pax === 'string' ? { age: present(pax) } : { age: present(pax['@_age']) ?? present(pax['#text']) }
    ),
  }));

  return {
    timeoutMilliseconds: present(root.timeoutMilliseconds),
    languageCode: present(root.source ? root.source.languageCode : undefined),
    optionsQuota: present(root.optionsQuota),
    credentials:
      first === undefined
        ? undefined
        : first === ''
          ? {}
          : {
              username: present(first['@_username']),
              password: present(first['@_password']),
              companyId: present(first['@_CompanyID']),
            },
    searchType: present(root.SearchType),
    destinations,
    startDate: present(root.StartDate),
    endDate: present(root.EndDate),
    currency: present(root.Currency),
    nationality: present(root.Nationality),
    market: present(root.Market),
    rooms,
  };
}

/**
 * Parse an AvailRQ XML string.
 * Throws AvailDocumentError for malformed XML, a missing AvailRQ root, or an
 * unexpected element shape.
 */
export function parseAvailRequestXml(xmlString: string): AvailRequestDocument {
  const validation = XMLValidator.validate(xmlString);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new AvailDocumentError(`Invalid XML: ${msg}`, [`line ${line}, column ${col}`]);
  }

  const parsed: unknown = xmlParser.parse(xmlString);
  const envelope = z.object({ AvailRQ: z.unknown() }).safeParse(parsed);
  if (!envelope.success || envelope.data.AvailRQ === undefined) {
    throw new AvailDocumentError('Invalid XML format: missing AvailRQ root element');
  }

  // <AvailRQ/> with nothing inside parses to ""
  const body = envelope.data.AvailRQ === '' ? {} : envelope.data.AvailRQ;
  try {
    return fromXmlTree(xmlRequestSchema.parse(body));
  } catch (err) {
    if (err instanceof ZodError) throw AvailDocumentError.fromZod(err);
    throw err;
  }
}

const jsonText = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .optional();

const jsonRequestSchema = z.object({
  timeoutMilliseconds: jsonText,
  languageCode: z.string().optional(),
  optionsQuota: jsonText,
  credentials: z
    .object({
      username: z.string().optional(),
      password: z.string().optional(),
      companyId: jsonText,
    })
    .optional(),
  searchType: z.string().optional(),
  destinations: z.array(z.object({ code: z.string().optional() })).default([]),
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  currency: z.string().optional(),
  nationality: z.string().optional(),
  market: z.string().optional(),
  rooms: z.array(z.object({ paxes: z.array(z.object({ age: jsonText })).default([]) })).default([]),
});

/**
 * Read the JSON encoding of an AvailRQ (already decoded by JSON.parse).
 * Field names match AvailRequestDocument; numbers are accepted for
 * optionsQuota, companyId and age.
 */
export function parseAvailRequestJson(value: unknown): AvailRequestDocument {
  const result = jsonRequestSchema.safeParse(value);
  if (!result.success) {
    throw AvailDocumentError.fromZod(result.error);
  }
  const body = result.data;
  return {
    timeoutMilliseconds: present(body.timeoutMilliseconds),
    languageCode: present(body.languageCode),
    optionsQuota: present(body.optionsQuota),
    credentials: body.credentials && {
      username: present(body.credentials.username),
      password: present(body.credentials.password),
      companyId: present(body.credentials.companyId),
    },
    searchType: present(body.searchType),
    destinations: body.destinations.map((d) => ({ code: present(d.code) })),
    startDate: present(body.startDate),
    endDate: present(body.endDate),
    currency: present(body.currency),
    nationality: present(body.nationality),
    market: present(body.market),
    rooms: body.rooms.map((room) => ({ paxes: room.paxes.map((pax) => ({ age: present(pax.age) })) })),
  };
}

/**
 * Pick the encoding from the first non-blank character: `<` is XML, anything
 * else is treated as JSON.
 */
export function parseAvailRequestText(text: string): AvailRequestDocument {
  // An XML declaration is only valid at offset 0
  const trimmed = text.trimStart();
  if (trimmed.startsWith('<')) {
    return parseAvailRequestXml(trimmed);
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new AvailDocumentError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseAvailRequestJson(value);
}
