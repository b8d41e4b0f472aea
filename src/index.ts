export { MessageSelectorEnv, RecordSelectorEnv, type SelectorEnv } from '@/core/env';
export { evaluateSelectorAst } from '@/core/eval';
export { compileSelector, Selector } from '@/core/selector';
export type { TriState } from '@/core/values';
export { getOrCompileSelector, getSelectorCache, SelectorCache } from '@/daemon/selectorCache';
export { loadSelectorConfig, type SelectorConfig } from '@/lib/config';
export { LexError, ParseError, SelectorError, toErrorPayload, type ErrorPayload } from '@/lib/errors';
export type { SelectorNode } from '@/lib/selector/ast';
export { parseSelector } from '@/lib/selector/parser';
export { renderSelector } from '@/lib/selector/render';
export type { Message, PropertyValue } from '@/lib/types';
