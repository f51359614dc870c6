import type DSMetaError from './src/errors/DSMetaError.js'
import type { DSMetaErrorCode } from './src/errors/DSMetaError.js'

/** 
 * GO-like error-as-value return  type. Used specifically to avoid
 * throwing errors, which generally produces messy control flow.
 */
export type XEav<V, EC extends DSMetaErrorCode> = [DSMetaError<EC>, null] | [null, V]

/**
 * Single-value procedural function return type.
 */
export type XEavS<EC extends DSMetaErrorCode> = DSMetaError<EC> | void

/**
 * Excludes the first constructor parameter.
 */
export type OmitFirst<T extends unknown[]> = T extends [unknown, ...infer Rest] ? Rest : never
