/**
 * Resource limits.
 *
 * @module
 */

/**
 * Default number of reduction steps one top-level evaluation may take,
 * nested strict and weak-head evaluations included, before it is reported
 * as non-terminating. This is a resource limit, not part of the language's
 * semantics.
 */
export const DEFAULT_MAX_ITERATIONS = 1_000_000;

/**
 * Default number of strict or weak-head evaluations that may be in progress
 * inside one another. Each level holds native stack frames.
 */
export const DEFAULT_MAX_DEPTH = 1_000;
