/**
 * 導覽轉場類型（page transition）
 *
 * 低 8 bits 為核心類型，高位元為 qualifier 旗標。
 * 原始值以 int32 儲存，負值代表最高位元（ServerRedirect）被設定。
 */

const CORE_MASK = 0xff;
const QUALIFIER_MASK = 0xffffff00;

const CORE_TRANSITIONS: Record<number, string> = {
  0: 'Link',
  1: 'Typed',
  2: 'AutoBookmark',
  3: 'AutoSubframe',
  4: 'ManualSubframe',
  5: 'Generated',
  6: 'AutoToplevel',
  7: 'FormSubmit',
  8: 'Reload',
  9: 'Keyword',
  10: 'KeywordGenerated',
};

const QUALIFIERS: ReadonlyArray<[number, string]> = [
  [0x00800000, 'Blocked'],
  [0x01000000, 'ForwardBack'],
  [0x02000000, 'FromAddressBar'],
  [0x04000000, 'HomePage'],
  [0x08000000, 'FromApi'],
  [0x10000000, 'ChainStart'],
  [0x20000000, 'ChainEnd'],
  [0x40000000, 'ClientRedirect'],
  [0x80000000, 'ServerRedirect'],
];

export class PageTransition {
  readonly core: string;
  readonly qualifiers: readonly string[];

  private constructor(public readonly value: number) {
    const unsigned = value >>> 0;
    const coreValue = unsigned & CORE_MASK;
    // 未知的核心類型保留數值，不視為錯誤
    this.core = CORE_TRANSITIONS[coreValue] ?? `Unknown(${coreValue})`;

    const qualifierBits = (unsigned & QUALIFIER_MASK) >>> 0;
    this.qualifiers = QUALIFIERS
      .filter(([flag]) => ((qualifierBits & flag) >>> 0) !== 0)
      .map(([, name]) => name);
  }

  static fromRaw(value: number): PageTransition {
    return new PageTransition(value);
  }

  toString(): string {
    return [this.core, ...this.qualifiers].join('; ');
  }

  toJSON(): string {
    return this.toString();
  }
}
