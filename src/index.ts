/**
 * index.ts
 * Public entry point. reflect-metadata is loaded before any decorator runs.
 */

import 'reflect-metadata';

export * from './models/index.js';
export * from './registry/index.js';
export * from './decorators/index.js';
export * from './builders/index.js';
export * from './services/index.js';
export * from './orchestrator/index.js';
export { DecoratorParser, DECORATOR_ROOTS } from './parsers/annotations/decorator-parser.js';
export type { ParsedDecorator } from './parsers/annotations/decorator-parser.js';
export { TsProjectFactory } from './parsers/ts/ts-project-factory.js';
