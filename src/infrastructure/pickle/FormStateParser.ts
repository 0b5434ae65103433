import type { FormState } from '../../domain/entities/PageState.js';

export const BLINK_FORM_STATE_MAGIC = '\n\r?% Blink serialized form state version 9 \n\r=&';

/**
 * 解析 frame document state 中的 Blink serialized form state（version 9）
 *
 * 格式：magic 之後重複 [formKey][itemCount]，每個 item 為
 * [name][type][valueCount][values...]，全部都是字串。
 * magic 不符回傳空陣列；中途資料不足時保留已解析的部分。
 */
export function parseFormState(documentState: readonly string[]): FormState[] {
  if (documentState.length === 0 || documentState[0] !== BLINK_FORM_STATE_MAGIC) {
    return [];
  }

  const forms = new Map<string, FormState>();
  let pos = 1;
  const next = (): string | undefined => documentState[pos++];
  const nextCount = (): number | undefined => {
    const raw = next();
    if (raw === undefined) return undefined;
    const count = Number.parseInt(raw, 10);
    return Number.isNaN(count) || count < 0 ? undefined : count;
  };

  while (pos < documentState.length) {
    const formKey = next();
    const itemCount = nextCount();
    if (formKey === undefined || itemCount === undefined) break;

    let form = forms.get(formKey);
    if (!form) {
      form = { formKey, fields: [] };
      forms.set(formKey, form);
    }

    for (let i = 0; i < itemCount; i++) {
      const name = next();
      const type = next();
      const valueCount = nextCount();
      if (name === undefined || type === undefined || valueCount === undefined) {
        return [...forms.values()];
      }

      let field = form.fields.find((f) => f.name === name && f.type === type);
      if (!field) {
        field = { name, type, values: [] };
        form.fields.push(field);
      }

      for (let j = 0; j < valueCount; j++) {
        const value = next();
        if (value === undefined) return [...forms.values()];
        field.values.push(value);
      }
    }
  }

  return [...forms.values()];
}
