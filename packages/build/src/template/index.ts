/**
 * Template engine exports
 */

export { ItemType, lex } from './lexer';
export type { Item } from './lexer';
export { parse } from './parser';
export type { Tree } from './parser';
export { execute } from './exec';
export { TemplateError, TemplatePhase, TEMPLATE_NAME } from './errors';
export { createFunctions } from './functions';
export { formatLayout, parseLayout } from './layout';
export { artifactFields, contextFields } from './fields';
export type { ArtifactFields } from './fields';
export { formatValue, isTemplateMap } from './values';
export type { FunctionMap, TemplateFunction, TemplateMap, TemplateValue } from './values';
export { Template, TemplateRenderer } from './template';
