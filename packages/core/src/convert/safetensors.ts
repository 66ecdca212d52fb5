import { readFile } from 'fs-extra';
import { z } from 'zod';
import { atomicWrite, InvalidFormatError, isRecord, parseJson } from '@adapterlab/shared';

/**
 * Safetensors container: an 8-byte little-endian header length, a JSON
 * header mapping tensor names to `{dtype, shape, data_offsets}` (plus an
 * optional `__metadata__` string map), then the raw tensor bytes.
 */

export const SAFETENSORS_DTYPES = [
  'F64',
  'F32',
  'F16',
  'BF16',
  'I64',
  'I32',
  'I16',
  'I8',
  'U64',
  'U32',
  'U16',
  'U8',
  'BOOL',
] as const;

export type SafetensorsDtype = (typeof SAFETENSORS_DTYPES)[number];

export const DTYPE_SIZE: Record<SafetensorsDtype, number> = {
  F64: 8,
  F32: 4,
  F16: 2,
  BF16: 2,
  I64: 8,
  I32: 4,
  I16: 2,
  I8: 1,
  U64: 8,
  U32: 4,
  U16: 2,
  U8: 1,
  BOOL: 1,
};

const METADATA_KEY = '__metadata__';
const HEADER_LENGTH_BYTES = 8;
/** Largest JSON header accepted */
const MAX_HEADER_BYTES = 100 * 1024 * 1024;

/**
 * One tensor. `data` holds the little-endian element bytes exactly as stored,
 * so copying a tensor never reinterprets its values.
 */
export interface Tensor {
  dtype: SafetensorsDtype;
  shape: number[];
  data: Uint8Array;
}

export interface SafetensorsContents {
  metadata: Record<string, string>;
  tensors: Map<string, Tensor>;
}

const HeaderEntrySchema = z.object({
  dtype: z.enum(SAFETENSORS_DTYPES),
  shape: z.array(z.number().int().nonnegative()),
  data_offsets: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
});

const MetadataSchema = z.record(z.string(), z.string());

export function tensorByteLength(dtype: SafetensorsDtype, shape: readonly number[]): number {
  return shape.reduce((n, dim) => n * dim, 1) * DTYPE_SIZE[dtype];
}

/**
 * @param source Label used in error messages, usually the file path
 * @throws InvalidFormatError if the header or any tensor extent is inconsistent
 */
export function decodeSafetensors(bytes: Uint8Array, source = '<buffer>'): SafetensorsContents {
  const fail = (message: string, field?: string) =>
    new InvalidFormatError(`Invalid safetensors data in ${source}: ${message}`, source, { field });

  if (bytes.byteLength < HEADER_LENGTH_BYTES) {
    throw fail(`expected at least ${HEADER_LENGTH_BYTES} bytes, got ${bytes.byteLength}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const headerLength = view.getBigUint64(0, true);
  if (headerLength > BigInt(Math.min(MAX_HEADER_BYTES, bytes.byteLength - HEADER_LENGTH_BYTES))) {
    const available = bytes.byteLength - HEADER_LENGTH_BYTES;
    throw fail(`header length ${headerLength} exceeds the available ${available} bytes`);
  }
  const dataStart = HEADER_LENGTH_BYTES + Number(headerLength);
  const dataLength = bytes.byteLength - dataStart;

  let header: unknown;
  try {
    const text = Buffer.from(bytes.subarray(HEADER_LENGTH_BYTES, dataStart)).toString('utf8');
    header = parseJson(text, source);
  } catch (error) {
    throw fail(error instanceof Error ? error.message : String(error));
  }
  if (!isRecord(header)) {
    throw fail('header is not a JSON object');
  }

  let metadata: Record<string, string> = {};
  const extents: Array<{
    name: string;
    begin: number;
    end: number;
    entry: z.infer<typeof HeaderEntrySchema>;
  }> = [];

  for (const [name, value] of Object.entries(header)) {
    if (name === METADATA_KEY) {
      const parsed = MetadataSchema.safeParse(value);
      if (!parsed.success) throw fail('__metadata__ must map strings to strings', METADATA_KEY);
      metadata = parsed.data;
      continue;
    }
    const parsed = HeaderEntrySchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.join('.');
      throw fail(`tensor "${name}": ${where ? `${where}: ` : ''}${issue.message}`, name);
    }
    const [begin, end] = parsed.data.data_offsets;
    const expected = tensorByteLength(parsed.data.dtype, parsed.data.shape);
    if (end < begin || end - begin !== expected) {
      throw fail(`tensor "${name}" spans ${end - begin} bytes, expected ${expected}`, name);
    }
    if (end > dataLength) {
      throw fail(`tensor "${name}" ends at ${end}, past the ${dataLength}-byte data section`, name);
    }
    extents.push({ name, begin, end, entry: parsed.data });
  }

  extents.sort((a, b) => a.begin - b.begin || a.end - b.end);
  let cursor = 0;
  for (const extent of extents) {
    if (extent.begin !== cursor) {
      throw fail(
        `tensor "${extent.name}" starts at ${extent.begin}, expected ${cursor}`,
        extent.name,
      );
    }
    cursor = extent.end;
  }
  if (cursor !== dataLength) {
    throw fail(`data section has ${dataLength - cursor} trailing bytes`);
  }

  const tensors = new Map<string, Tensor>();
  for (const { name, begin, end, entry } of extents.sort((a, b) => (a.name < b.name ? -1 : 1))) {
    tensors.set(name, {
      dtype: entry.dtype,
      shape: entry.shape,
      data: bytes.slice(dataStart + begin, dataStart + end),
    });
  }
  return { metadata, tensors };
}

/**
 * Serializes tensors in name order. The header is padded with spaces so the
 * data section starts on an 8-byte boundary.
 *
 * @throws InvalidFormatError if a tensor's byte length does not match its dtype and shape
 */
export function encodeSafetensors(
  tensors: ReadonlyMap<string, Tensor>,
  metadata: Record<string, string> = {},
): Uint8Array {
  const names = [...tensors.keys()].sort();
  const header: Record<string, unknown> = {};
  if (Object.keys(metadata).length > 0) {
    header[METADATA_KEY] = metadata;
  }

  const chunks: Uint8Array[] = [];
  let offset = 0;
  for (const name of names) {
    const tensor = tensors.get(name);
    if (!tensor) continue;
    const expected = tensorByteLength(tensor.dtype, tensor.shape);
    if (tensor.data.byteLength !== expected) {
      throw new InvalidFormatError(
        `Tensor "${name}" has ${tensor.data.byteLength} bytes, ` +
          `expected ${expected} for ${tensor.dtype}[${tensor.shape.join(', ')}]`,
        name,
        { field: name },
      );
    }
    header[name] = {
      dtype: tensor.dtype,
      shape: tensor.shape,
      data_offsets: [offset, offset + expected],
    };
    chunks.push(tensor.data);
    offset += expected;
  }

  let headerBytes = Buffer.from(JSON.stringify(header), 'utf8');
  const padding = (8 - (headerBytes.byteLength % 8)) % 8;
  if (padding > 0) {
    headerBytes = Buffer.concat([headerBytes, Buffer.alloc(padding, 0x20)]);
  }

  const prefix = Buffer.alloc(HEADER_LENGTH_BYTES);
  prefix.writeBigUInt64LE(BigInt(headerBytes.byteLength));
  return new Uint8Array(Buffer.concat([prefix, headerBytes, ...chunks]));
}

export async function readSafetensorsFile(path: string): Promise<SafetensorsContents> {
  return decodeSafetensors(await readFile(path), path);
}

export async function writeSafetensorsFile(
  path: string,
  tensors: ReadonlyMap<string, Tensor>,
  metadata?: Record<string, string>,
): Promise<void> {
  await atomicWrite(path, encodeSafetensors(tensors, metadata));
}
