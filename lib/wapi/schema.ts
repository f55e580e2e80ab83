import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { DnsRecord, ExtensibleAttributes } from '../types';

type AddressField = 'ipv4addr' | 'ipv6addr';

// WAPI object types the fetcher understands, keyed by object type.
export const RECORD_TYPES: Readonly<Record<string, { addressField: AddressField }>> = {
  'record:a': { addressField: 'ipv4addr' },
  'record:aaaa': { addressField: 'ipv6addr' },
};

export function addressFieldFor(recordType: string): AddressField {
  const def = RECORD_TYPES[recordType];
  if (!def) {
    const known = Object.keys(RECORD_TYPES).join(', ');
    throw new ConfigurationError(`Unsupported record type "${recordType}" (expected one of: ${known})`);
  }
  return def.addressField;
}

/** `_return_fields` projection for a record type. */
export function returnFieldsFor(recordType: string): string {
  return ['name', addressFieldFor(recordType), 'last_queried', 'extattrs'].join(',');
}

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const extattrSchema = z
  .object({
    value: z.union([scalarSchema, z.array(scalarSchema)]),
  })
  .passthrough();

export const wireRecordSchema = z
  .object({
    _ref: z.string().optional(),
    name: z.string(),
    ipv4addr: z.string().optional(),
    ipv6addr: z.string().optional(),
    last_queried: z.number().nonnegative().nullish(),
    extattrs: z.record(extattrSchema).optional(),
  })
  .passthrough();

export type WireRecord = z.infer<typeof wireRecordSchema>;

export const wirePageSchema = z.object({
  result: z.array(wireRecordSchema),
  next_page_id: z.string().nullish(),
});

export interface RecordPage {
  records: DnsRecord[];
  nextPageId?: string;
}

function renderValue(value: z.infer<typeof extattrSchema>['value']): string {
  if (Array.isArray(value)) return value.map(String).join(', ');
  return String(value);
}

function toExtendedAttributes(extattrs: WireRecord['extattrs']): ExtensibleAttributes {
  const out: Record<string, { value: string }> = {};
  for (const [key, attr] of Object.entries(extattrs ?? {})) {
    out[key] = Object.freeze({ value: renderValue(attr.value) });
  }
  return Object.freeze(out);
}

/**
 * Map one validated wire object to a `DnsRecord`.
 * A `last_queried` of 0 or null means query monitoring has no data, same as a missing field.
 */
export function toDnsRecord(wire: WireRecord, recordType: string, address: string): DnsRecord {
  const lastQueried = wire.last_queried ? wire.last_queried : undefined;
  return Object.freeze({
    recordType,
    ...(wire._ref ? { ref: wire._ref } : {}),
    name: wire.name,
    address,
    ...(lastQueried !== undefined ? { lastQueried } : {}),
    extendedAttributes: toExtendedAttributes(wire.extattrs),
  });
}

export type PageParseResult =
  | { success: true; page: RecordPage }
  | { success: false; error: string };

/**
 * Validate one paged response body and convert its records.
 * Every record must carry the address field requested for `recordType`.
 */
export function parsePage(body: unknown, recordType: string): PageParseResult {
  const addressField = addressFieldFor(recordType);
  const parsed = wirePageSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join('.') : 'body';
    return { success: false, error: `${where}: ${issue ? issue.message : 'invalid page'}` };
  }

  const records: DnsRecord[] = [];
  for (const [i, wire] of parsed.data.result.entries()) {
    const address = wire[addressField];
    if (typeof address !== 'string') {
      return { success: false, error: `result.${i}.${addressField}: Required` };
    }
    records.push(toDnsRecord(wire, recordType, address));
  }

  const cursor = parsed.data.next_page_id;
  return { success: true, page: cursor ? { records, nextPageId: cursor } : { records } };
}
