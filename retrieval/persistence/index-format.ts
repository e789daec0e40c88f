import { CorruptionError } from '../errors';
import { createVectorIndex, type CreateVectorIndexOptions } from '../vector';
import type { VectorIndex } from '../vector/vector-index';

// Layout: magic(4) | version u16 | reserved u16 | dimension u32 | count u32 | count*dimension float32, all little-endian.
const MAGIC = 'SIVX';
export const INDEX_FORMAT_VERSION = 1;
const HEADER_BYTES = 16;
const FLOAT_BYTES = 4;

export interface IndexHeader {
  version: number;
  dimension: number;
  count: number;
}

export function encodeIndex(index: VectorIndex): Buffer {
  const { dimension, count } = index;
  const buffer = Buffer.alloc(HEADER_BYTES + count * dimension * FLOAT_BYTES);

  buffer.write(MAGIC, 0, 'ascii');
  buffer.writeUInt16LE(INDEX_FORMAT_VERSION, 4);
  buffer.writeUInt16LE(0, 6);
  buffer.writeUInt32LE(dimension, 8);
  buffer.writeUInt32LE(count, 12);

  let offset = HEADER_BYTES;
  for (let position = 0; position < count; position += 1) {
    const vector = index.vectorAt(position);
    for (let j = 0; j < dimension; j += 1) {
      buffer.writeFloatLE(vector[j], offset);
      offset += FLOAT_BYTES;
    }
  }

  return buffer;
}

/**
 * Reads only the header, so the vector count is available without touching
 * the metadata artifact.
 */
export function readIndexHeader(buffer: Buffer): IndexHeader {
  if (buffer.length < HEADER_BYTES) {
    throw new CorruptionError('Index artifact is truncated');
  }
  if (buffer.toString('ascii', 0, 4) !== MAGIC) {
    throw new CorruptionError('Index artifact has an unknown format');
  }

  const version = buffer.readUInt16LE(4);
  if (version !== INDEX_FORMAT_VERSION) {
    throw new CorruptionError(`Unsupported index format version ${version}`);
  }

  const dimension = buffer.readUInt32LE(8);
  const count = buffer.readUInt32LE(12);
  if (dimension === 0) {
    throw new CorruptionError('Index artifact declares a zero dimension');
  }

  const expectedBytes = HEADER_BYTES + count * dimension * FLOAT_BYTES;
  if (buffer.length !== expectedBytes) {
    throw new CorruptionError(`Index artifact is ${buffer.length} bytes, expected ${expectedBytes}`);
  }

  return { version, dimension, count };
}

export function decodeIndex(buffer: Buffer, options: CreateVectorIndexOptions = {}): VectorIndex {
  const { dimension, count } = readIndexHeader(buffer);
  const rows: Float32Array[] = [];

  let offset = HEADER_BYTES;
  for (let position = 0; position < count; position += 1) {
    const row = new Float32Array(dimension);
    for (let j = 0; j < dimension; j += 1) {
      row[j] = buffer.readFloatLE(offset);
      offset += FLOAT_BYTES;
    }
    rows.push(row);
  }

  const index = createVectorIndex(dimension, options);
  try {
    index.add(rows);
  } catch (error) {
    throw new CorruptionError('Index artifact contains invalid vectors', { cause: error });
  }
  return index;
}
