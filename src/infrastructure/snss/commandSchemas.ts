import type { Command } from '../../domain/commands/Command.js';
import type { SessionKind } from '../../domain/commands/DecodeOutcome.js';
import type { WindowShowState } from '../../domain/entities/Window.js';
import { HAS_POST_DATA_MASK } from '../../domain/entities/NavigationEntry.js';
import type { NavigationEntry } from '../../domain/entities/NavigationEntry.js';
import { PageTransition } from '../../domain/value-objects/PageTransition.js';
import { decodePageState } from '../pickle/PageStateDecoder.js';
import type { BuildContext, CommandSchema, DecodedFields, FieldSpec } from './CommandSchema.js';

/** 目前已知最舊與最新的 SNSS 檔案版本 */
export const MIN_FORMAT_VERSION = 1;
/** 版本 3 起檔案含 initial state marker */
export const MARKER_FORMAT_VERSION = 3;

const ANY_VERSION = Number.POSITIVE_INFINITY;

const SHOW_STATES: Record<number, WindowShowState> = {
  0: 'default',
  1: 'normal',
  2: 'minimized',
  3: 'maximized',
  4: 'inactive',
  5: 'fullscreen',
};

function showState(value: number): WindowShowState {
  return SHOW_STATES[value] ?? value;
}

// --- 共用欄位組 ---

const ID_AND_INDEX: readonly FieldSpec[] = [
  { name: 'id', type: 'Int32' },
  { name: 'index', type: 'Int32' },
];

/** {id, int64 time}：int64 需要 8-byte 對齊，中間有 4 bytes padding */
const ID_AND_TIME: readonly FieldSpec[] = [
  { name: 'id', type: 'Int32' },
  { name: 'padding', type: 'Padding' },
  { name: 'time', type: 'Timestamp' },
];

const ID_AND_STRING_PICKLE: readonly FieldSpec[] = [
  { name: 'pickleSize', type: 'PickleHeader' },
  { name: 'id', type: 'Int32' },
  { name: 'value', type: 'String' },
];

const BOUNDS: readonly FieldSpec[] = [
  { name: 'windowId', type: 'Int32' },
  { name: 'x', type: 'Int32' },
  { name: 'y', type: 'Int32' },
  { name: 'width', type: 'Int32' },
  { name: 'height', type: 'Int32' },
];

/**
 * 導覽項目 pickle
 *
 * transition 之後的欄位是逐版加入的，舊寫入端可能沒有，標為 optional。
 * referrerPolicy 出現兩次：前者為舊值，後者（較新）覆蓋前者。
 */
const NAVIGATION_PICKLE: readonly FieldSpec[] = [
  { name: 'pickleSize', type: 'PickleHeader' },
  { name: 'tabId', type: 'Int32' },
  { name: 'index', type: 'Int32' },
  { name: 'url', type: 'String' },
  { name: 'title', type: 'String16' },
  { name: 'pageState', type: 'Blob' },
  { name: 'transitionType', type: 'Int32' },
  { name: 'typeMask', type: 'Int32', optional: true },
  { name: 'referrerUrl', type: 'String', optional: true },
  { name: 'obsoleteReferrerPolicy', type: 'Int32', optional: true },
  { name: 'originalRequestUrl', type: 'String', optional: true },
  { name: 'isOverridingUserAgent', type: 'Bool', optional: true },
  { name: 'timestamp', type: 'Timestamp', optional: true },
  { name: 'searchTerms', type: 'String16', optional: true },
  { name: 'httpStatusCode', type: 'Int32', optional: true },
  { name: 'referrerPolicy', type: 'Int32', optional: true },
];

function buildNavigation(f: DecodedFields, context: BuildContext): Command {
  const typeMask = f.int('typeMask');
  const pageStateBytes = f.bytes('pageState');
  const timestamp = f.timestamp('timestamp');

  let pageState: NavigationEntry['pageState'] = null;
  let pageStateError: string | null = null;
  if (context.decodePageState && pageStateBytes && pageStateBytes.length > 0) {
    const decoded = decodePageState(pageStateBytes);
    if (decoded.ok) {
      pageState = decoded.value;
    } else {
      pageStateError = `${decoded.error.code} at +${decoded.error.offset}: ${decoded.error.detail}`;
    }
  }

  const entry: NavigationEntry = {
    index: f.int('index'),
    url: f.string('url'),
    title: f.string('title'),
    referrer: f.string('referrerUrl'),
    transitionType: PageTransition.fromRaw(f.int('transitionType')),
    timestamp: timestamp && !timestamp.isNull ? timestamp : null,
    isOverwrite: false,
    typeMask,
    hasPostData: (typeMask & HAS_POST_DATA_MASK) !== 0,
    originalRequestUrl: f.string('originalRequestUrl'),
    isOverridingUserAgent: f.bool('isOverridingUserAgent'),
    searchTerms: f.string('searchTerms'),
    httpStatusCode: f.int('httpStatusCode'),
    referrerPolicy: f.has('referrerPolicy')
      ? f.int('referrerPolicy')
      : f.int('obsoleteReferrerPolicy', -1),
    pageStateSize: pageStateBytes?.length ?? 0,
    pageState,
    pageStateError,
  };

  return { kind: 'UpdateTabNavigation', tabId: f.int('tabId'), entry };
}

function row(
  sessionKind: SessionKind,
  commandId: number,
  name: string,
  fields: readonly FieldSpec[],
  build: CommandSchema['build'],
  minVersion = MIN_FORMAT_VERSION,
  maxVersion = ANY_VERSION,
): CommandSchema {
  return { sessionKind, commandId, name, minVersion, maxVersion, fields, build };
}

/**
 * 靜態 schema 表
 *
 * 只收錄欄位配置經過確認的指令；tab group、workspace、tab restore 的
 * window/group entry 等配置不明的指令一律以 UnknownCommand 保留原始 payload。
 */
export const COMMAND_SCHEMAS: readonly CommandSchema[] = [
  // --- Current/Last Session ---
  row('session', 0, 'SetTabWindow', [
    { name: 'windowId', type: 'Int32' },
    { name: 'tabId', type: 'Int32' },
  ], (f) => ({ kind: 'SetTabWindow', windowId: f.int('windowId'), tabId: f.int('tabId') })),

  row('session', 2, 'SetTabIndexInWindow', ID_AND_INDEX,
    (f) => ({ kind: 'SetTabIndex', tabId: f.int('id'), index: f.int('index') })),

  row('session', 5, 'TabNavigationPathPrunedFromBack', ID_AND_INDEX,
    (f) => ({ kind: 'TabNavigationPathPrunedFromBack', tabId: f.int('id'), index: f.int('index') })),

  row('session', 6, 'UpdateTabNavigation', NAVIGATION_PICKLE, buildNavigation),

  row('session', 7, 'SetSelectedNavigationIndex', ID_AND_INDEX,
    (f) => ({ kind: 'SetActiveNavigationIndex', tabId: f.int('id'), index: f.int('index'), timestamp: null })),

  row('session', 8, 'SetSelectedTabInIndex', ID_AND_INDEX,
    (f) => ({ kind: 'SetSelectedTabInWindow', windowId: f.int('id'), index: f.int('index') })),

  // 視窗開啟時寫入的第一筆視窗指令
  row('session', 9, 'SetWindowType', [
    { name: 'windowId', type: 'Int32' },
    { name: 'windowType', type: 'Int32' },
  ], (f) => ({ kind: 'CreateWindow', windowId: f.int('windowId'), windowType: f.int('windowType') })),

  row('session', 10, 'SetWindowBounds2', [
    ...BOUNDS,
    { name: 'isMaximized', type: 'UInt8' },
  ], (f) => ({
    kind: 'UpdateWindowBounds',
    windowId: f.int('windowId'),
    bounds: {
      x: f.int('x'),
      y: f.int('y'),
      width: f.int('width'),
      height: f.int('height'),
      showState: f.bool('isMaximized') ? 'maximized' : 'normal',
    },
  })),

  row('session', 11, 'TabNavigationPathPrunedFromFront', [
    { name: 'id', type: 'Int32' },
    { name: 'count', type: 'Int32' },
  ], (f) => ({ kind: 'TabNavigationPathPrunedFromFront', tabId: f.int('id'), count: f.int('count') })),

  row('session', 12, 'SetPinnedState', [
    { name: 'id', type: 'Int32' },
    { name: 'pinned', type: 'UInt8' },
  ], (f) => ({ kind: 'SetPinnedState', tabId: f.int('id'), pinned: f.bool('pinned') })),

  row('session', 13, 'SetExtensionAppID', ID_AND_STRING_PICKLE,
    (f) => ({ kind: 'SetExtensionAppId', tabId: f.int('id'), appId: f.string('value') })),

  row('session', 14, 'SetWindowBounds3', [
    ...BOUNDS,
    { name: 'showState', type: 'Int32' },
  ], (f) => ({
    kind: 'UpdateWindowBounds',
    windowId: f.int('windowId'),
    bounds: {
      x: f.int('x'),
      y: f.int('y'),
      width: f.int('width'),
      height: f.int('height'),
      showState: showState(f.int('showState')),
    },
  })),

  row('session', 15, 'SetWindowAppName', ID_AND_STRING_PICKLE,
    (f) => ({ kind: 'SetWindowAppName', windowId: f.int('id'), appName: f.string('value') })),

  row('session', 16, 'TabClosed', ID_AND_TIME,
    (f) => ({ kind: 'TabClosed', tabId: f.int('id'), closedAt: f.requiredTimestamp('time') })),

  row('session', 17, 'WindowClosed', ID_AND_TIME,
    (f) => ({ kind: 'WindowClosed', windowId: f.int('id'), closedAt: f.requiredTimestamp('time') })),

  row('session', 18, 'SetTabUserAgentOverride', ID_AND_STRING_PICKLE,
    (f) => ({ kind: 'SetTabUserAgentOverride', tabId: f.int('id'), userAgent: f.string('value') })),

  row('session', 19, 'SessionStorageAssociated', ID_AND_STRING_PICKLE,
    (f) => ({ kind: 'SessionStorageAssociated', tabId: f.int('id'), persistentId: f.string('value') })),

  row('session', 20, 'SetActiveWindow', [{ name: 'windowId', type: 'Int32' }],
    (f) => ({ kind: 'SetActiveWindow', windowId: f.int('windowId') })),

  row('session', 21, 'LastActiveTime', ID_AND_TIME,
    (f) => ({ kind: 'LastActiveTime', tabId: f.int('id'), time: f.requiredTimestamp('time') })),

  row('session', 24, 'TabNavigationPathPruned', [
    { name: 'id', type: 'Int32' },
    { name: 'index', type: 'Int32' },
    { name: 'count', type: 'Int32' },
  ], (f) => ({
    kind: 'TabNavigationPathPruned',
    tabId: f.int('id'),
    index: f.int('index'),
    count: f.int('count'),
  })),

  row('session', 255, 'InitialStateMarker', [],
    () => ({ kind: 'InitialStateMarker' }), MARKER_FORMAT_VERSION),

  // --- Current/Last Tabs ---
  row('tabs', 1, 'UpdateTabNavigation', NAVIGATION_PICKLE, buildNavigation),

  row('tabs', 4, 'SelectedNavigationInTab', [
    { name: 'id', type: 'Int32' },
    { name: 'index', type: 'Int32' },
    { name: 'timestamp', type: 'Timestamp' },
  ], (f) => ({
    kind: 'SetActiveNavigationIndex',
    tabId: f.int('id'),
    index: f.int('index'),
    timestamp: f.timestamp('timestamp'),
  })),
];

/** 依 (kind, id, version) 查 schema；找不到回傳 undefined */
export function findCommandSchema(
  sessionKind: SessionKind,
  commandId: number,
  formatVersion: number,
): CommandSchema | undefined {
  return COMMAND_SCHEMAS.find((schema) =>
    schema.sessionKind === sessionKind &&
    schema.commandId === commandId &&
    formatVersion >= schema.minVersion &&
    formatVersion <= schema.maxVersion);
}
