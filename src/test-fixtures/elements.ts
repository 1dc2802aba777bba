import type { ElementSnapshot } from '../bot/page-driver';

let refSeq = 0;

export function element(partial: Partial<ElementSnapshot> = {}): ElementSnapshot {
  refSeq += 1;
  return {
    ref: `el-${refSeq}`,
    tag: 'div',
    text: '',
    id: '',
    role: '',
    name: '',
    type: '',
    classes: [],
    attributes: {},
    value: '',
    placeholder: '',
    labelText: '',
    containerText: '',
    visible: true,
    enabled: true,
    readOnly: false,
    ...partial,
  };
}

export function input(
  name: string,
  partial: Partial<ElementSnapshot> = {},
): ElementSnapshot {
  return element({
    ref: `input-${name}`,
    tag: 'input',
    type: 'text',
    name,
    classes: ['x-form-field'],
    ...partial,
  });
}

export function button(
  ref: string,
  text: string,
  partial: Partial<ElementSnapshot> = {},
): ElementSnapshot {
  return element({
    ref,
    tag: 'span',
    text,
    classes: ['x-btn-inner'],
    ...partial,
  });
}
