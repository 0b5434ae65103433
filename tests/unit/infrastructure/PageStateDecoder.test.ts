import { describe, it, expect } from 'vitest';
import { decodePageState } from '../../../src/infrastructure/pickle/PageStateDecoder.js';
import { BLINK_FORM_STATE_MAGIC } from '../../../src/infrastructure/pickle/FormStateParser.js';
import { PickleWriter } from '../../helpers/SnssFixtureBuilder.js';

interface FrameFixture {
  url: string;
  documentState?: string[];
  postData?: Uint8Array;
  children?: FrameFixture[];
}

/** version 20 的 frame 配置 */
function writeFrame(w: PickleWriter, frame: FrameFixture): void {
  w.string16Bytes(frame.url)
    .string16Bytes(null)
    .int32(0).int32(120)
    .string16Bytes('https://referrer.test/');

  const docState = frame.documentState ?? [];
  w.int32(docState.length);
  for (const s of docState) w.string16Bytes(s);

  w.doubleBlob(1.5)
    .int64(11n)
    .int64(22n)
    .int32(3)
    .doubleBlob(0)
    .doubleBlob(0)
    .bool(false);

  if (frame.postData) {
    w.bool(true)
      .int32(1)
      .int32(0).blob(frame.postData)
      .int64(7n)
      .bool(false);
  } else {
    w.bool(false);
  }
  w.string16Bytes(frame.postData ? 'application/x-www-form-urlencoded' : null);

  const children = frame.children ?? [];
  w.int32(children.length);
  for (const child of children) writeFrame(w, child);
}

function pageState(frame: FrameFixture, referencedFiles: string[] = []): Uint8Array {
  const w = new PickleWriter().int32(20).int32(referencedFiles.length);
  for (const file of referencedFiles) w.string16Bytes(file);
  writeFrame(w, frame);
  return w.pickled();
}

/** version 11 的 frame 配置：子 frame 前有 int，子 frame 數量前有 double + bool */
function writeFrameV11(w: PickleWriter, url: string, isTop: boolean, children: string[]): void {
  if (!isTop) w.int32(0);
  w.string16Bytes(url)
    .string16Bytes(url)
    .string16Bytes(null)
    .string16Bytes(null).string16Bytes(null).string16Bytes(null)
    .doubleBlob(0)
    .int32(4).int32(8)
    .bool(false).int32(0)
    .string16Bytes(null)
    .int32(0)
    .doubleBlob(1)
    .int64(1n)
    .int64(2n)
    .bool(false)
    .bool(false)
    .string16Bytes(null)
    .string16Bytes(null)
    .doubleBlob(2)
    .bool(true)
    .int32(children.length);
  for (const child of children) writeFrameV11(w, child, false, []);
}

describe('decodePageState', () => {
  it('decodes a version 20 frame tree', () => {
    const result = decodePageState(pageState({
      url: 'https://example.com/',
      children: [{ url: 'https://example.com/frame' }],
    }, ['/tmp/upload.txt']));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const state = result.value;
    expect(state.version).toBe(20);
    expect(state.url).toBe('https://example.com/');
    expect(state.referencedFiles).toEqual(['/tmp/upload.txt']);

    const frame = state.frame;
    expect(frame?.target).toBeNull();
    expect(frame?.scrollOffset).toEqual({ x: 0, y: 120 });
    expect(frame?.referrer).toBe('https://referrer.test/');
    expect(frame?.pageScaleFactor).toBe(1.5);
    expect(frame?.itemSequenceNumber).toBe(11n);
    expect(frame?.documentSequenceNumber).toBe(22n);
    expect(frame?.referrerPolicy).toBe(3);
    expect(frame?.stateObject).toBeNull();
    expect(frame?.httpBody).toBeNull();
    expect(frame?.children.map((child) => child.url)).toEqual(['https://example.com/frame']);
  });

  it('decodes a version 11 frame tree with its extra fields', () => {
    const w = new PickleWriter().int32(11);
    writeFrameV11(w, 'https://old.test/', true, ['https://old.test/child']);
    const result = decodePageState(w.pickled());

    if (!result.ok) throw new Error(result.error.detail);
    expect(result.value.version).toBe(11);
    expect(result.value.referencedFiles).toEqual([]);
    expect(result.value.url).toBe('https://old.test/');
    expect(result.value.frame?.scrollOffset).toEqual({ x: 4, y: 8 });
    expect(result.value.frame?.referrerPolicy).toBe(-1);
    expect(result.value.frame?.children.map((child) => child.url)).toEqual(['https://old.test/child']);
  });

  it('parses form state from the document state', () => {
    const result = decodePageState(pageState({
      url: 'https://example.com/search',
      documentState: [BLINK_FORM_STATE_MAGIC, 'form1', '1', 'q', 'text', '1', 'hello'],
    }));

    expect(result.ok && result.value.frame?.formState).toEqual([
      { formKey: 'form1', fields: [{ name: 'q', type: 'text', values: ['hello'] }] },
    ]);
  });

  it('decodes HTTP body data and content type', () => {
    const result = decodePageState(pageState({ url: 'https://example.com/post', postData: Uint8Array.of(1, 2, 3) }));
    if (!result.ok) throw new Error(result.error.detail);

    const body = result.value.frame?.httpBody;
    expect(body?.data.map((d) => [...d])).toEqual([[1, 2, 3]]);
    expect(body?.identifier).toBe(7n);
    expect(body?.containsPasswords).toBe(false);
    expect(body?.contentType).toBe('application/x-www-form-urlencoded');
  });

  it('decodes the url-only legacy format', () => {
    const bytes = new PickleWriter().int32(-1).string('https://legacy.test/').pickled();
    expect(decodePageState(bytes)).toEqual({
      ok: true,
      value: { version: -1, referencedFiles: [], frame: null, url: 'https://legacy.test/' },
    });
  });

  it('rejects versions outside the supported range', () => {
    expect(decodePageState(new PickleWriter().int32(27).pickled())).toEqual({
      ok: false,
      error: { code: 'UnsupportedVersion', offset: 0, detail: 'unsupported page state version 27' },
    });
  });

  it('fails with TruncatedData when the frame is cut short', () => {
    const bytes = new PickleWriter().int32(20).int32(0).string16Bytes('https://example.com/').pickled();
    const result = decodePageState(bytes);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('TruncatedData');
  });

  it('rejects vector counts larger than the remaining data', () => {
    const bytes = new PickleWriter().int32(20).int32(1000).pickled();
    expect(decodePageState(bytes)).toEqual({
      ok: false,
      error: { code: 'InvalidLength', offset: 4, detail: 'referenced file count 1000 exceeds remaining data' },
    });
  });

  it('fails on a missing pickle header', () => {
    const result = decodePageState(Uint8Array.of(1));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('TruncatedData');
  });
});
