/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './export'
export * from './record'
export * from './tree'
