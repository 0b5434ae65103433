import { describe, it, expect } from 'vitest';
import { RecordStream } from '../../../src/infrastructure/snss/RecordStream.js';
import type { RecordStreamItem } from '../../../src/infrastructure/snss/RecordStream.js';
import { BufferByteSource } from '../../../src/infrastructure/source/BufferByteSource.js';
import { InvalidSessionHeaderError } from '../../../src/domain/errors/DomainErrors.js';
import { concat, header, record } from '../../helpers/SnssFixtureBuilder.js';

function summarize(items: Iterable<RecordStreamItem>): string[] {
  return [...items].map((item) => {
    switch (item.kind) {
      case 'record':
        return `record@${item.offset}:${item.size}`;
      case 'end':
        return `end@${item.offset}`;
      case 'truncated':
        return `truncated@${item.offset}:${item.declaredSize ?? 'prefix'}/${item.available}`;
    }
  });
}

describe('RecordStream', () => {
  it('reads the header and yields records in file order', () => {
    const bytes = concat(header(3), record(9, Uint8Array.of(1, 0, 0, 0)), record(255));
    const stream = new RecordStream(new BufferByteSource(bytes));

    expect(stream.header).toEqual({ magic: 'SNSS', version: 3 });
    expect(summarize(stream)).toEqual(['record@8:5', 'record@17:1', 'end@22']);
    expect(stream.bytesConsumed).toBe(22);
  });

  it('exposes the payload including the command id', () => {
    const stream = new RecordStream(new BufferByteSource(record(20, Uint8Array.of(4, 0, 0, 0))), { header: 'absent' });
    const item = stream.next();
    expect(item.kind).toBe('record');
    if (item.kind === 'record') {
      expect([...item.payload]).toEqual([20, 4, 0, 0, 0]);
    }
  });

  it('treats a file without magic as a bare record sequence in auto mode', () => {
    const stream = new RecordStream(new BufferByteSource(concat(record(1), record(2))));
    expect(stream.header).toBeNull();
    expect(summarize(stream)).toEqual(['record@0:1', 'record@5:1', 'end@10']);
  });

  it('throws InvalidSessionHeaderError when the header is required', () => {
    const bytes = concat(record(1), record(2));
    expect(() => new RecordStream(new BufferByteSource(bytes), { header: 'required' }))
      .toThrow(InvalidSessionHeaderError);
    expect(() => new RecordStream(new BufferByteSource(bytes), { header: 'required' }))
      .toThrow('actual: 01000000');
  });

  it('reports a declared size beyond the remaining bytes as truncated', () => {
    const full = concat(header(1), record(0, Uint8Array.of(1, 0, 0, 0, 2, 0, 0, 0)), record(7, new Uint8Array(8)));
    const cut = full.subarray(0, full.length - 3);
    const stream = new RecordStream(new BufferByteSource(cut));

    expect(summarize(stream)).toEqual(['record@8:9', 'truncated@21:9/6']);
  });

  it('reports an incomplete size prefix as truncated', () => {
    const bytes = concat(record(1), Uint8Array.of(5, 0));
    const stream = new RecordStream(new BufferByteSource(bytes), { header: 'absent' });
    expect(summarize(stream)).toEqual(['record@0:1', 'truncated@5:prefix/2']);
  });

  it('keeps returning the terminal item', () => {
    const stream = new RecordStream(new BufferByteSource(record(1)), { header: 'absent' });
    stream.next();
    expect(stream.next()).toEqual({ kind: 'end', offset: 5 });
    expect(stream.next()).toEqual({ kind: 'end', offset: 5 });
  });

  it('restarts from the first record on every iteration', () => {
    const stream = new RecordStream(new BufferByteSource(concat(header(3), record(1))));
    const first = summarize(stream);
    const second = summarize(stream);
    expect(second).toEqual(first);
    expect(stream.header).toEqual({ magic: 'SNSS', version: 3 });
  });

  it('reads 16-bit size prefixes', () => {
    const bytes = concat(header(1), record(8, Uint8Array.of(1, 0, 0, 0, 0, 0, 0, 0), 2), record(20, Uint8Array.of(1, 0, 0, 0), 2));
    const stream = new RecordStream(new BufferByteSource(bytes), { recordSizeBytes: 2 });
    expect(summarize(stream)).toEqual(['record@8:9', 'record@19:5', 'end@26']);
  });

  it('ends immediately on an empty body', () => {
    const stream = new RecordStream(new BufferByteSource(header(3)));
    expect(stream.next()).toEqual({ kind: 'end', offset: 8 });
  });
});
