export { Template, renderTemplate } from './Template';
export type { TemplateOptions } from './Template';
export { Renderer, NAMED_CHARACTERS } from './core/renderer';
export { TextScanner } from './scanner/TextScanner';
export type { TextScannerOptions } from './scanner/TextScanner';
export { TokenKind, parseToken, SELF_REFERENCE } from './token/Token';
export type { Token, ValueToken, BlockOpenToken, PlainToken } from './token/Token';
export { readToken } from './token/read-token';
export { findBlockEnd } from './block/find-block-end';
export { ContextFrame, MARKER_VALUE, markerName } from './context/ContextFrame';
export type { LookupResult, InstanceMarker } from './context/ContextFrame';
export { ContextStack } from './context/ContextStack';
export { resolvePathComponent, splitPath } from './context/path-resolution';
export type { PathStep, SplitPath } from './context/path-resolution';
export { StringSink } from './output/OutputSink';
export type { OutputSink } from './output/OutputSink';
export * from './formatters';
