/**
 * linekit - line- and field-oriented text search, sorting, diffing and
 * restructuring
 *
 * @module
 */

// Core types, errors, config and line sources
export * from "./core/mod.ts";

// Engines
export * from "./commands/mod.ts";

// In-memory line source
export { MemoryLineSource } from "./vfs/memory-source.ts";
