/**
 * Models layer exports for FlySight device structures.
 */

export * from './directory';
export * from './peripheral';
export * from './start';
