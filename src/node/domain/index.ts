/**
 * Domain Layer - Pure graph layout logic with no I/O dependencies.
 *
 * All classes in this module are synchronous and operate on in-memory data.
 * Reading a repository happens in the adapters layer.
 */

export { BranchCatalogBuilder } from './BranchCatalogBuilder'
export type { CatalogInput, CatalogResult } from './BranchCatalogBuilder'
export { BranchConsolidator } from './BranchConsolidator'
export type { ConsolidatedGraph } from './BranchConsolidator'
export { BranchPatterns } from './BranchPatterns'
export { BranchTracer } from './BranchTracer'
export { ColumnAllocator } from './ColumnAllocator'
export { CommitIndex } from './CommitIndex'
export type { CommitIndexOptions } from './CommitIndex'
export { GraphBuilder } from './GraphBuilder'
export type { GraphBuildOptions } from './GraphBuilder'
export { SourceTargetResolver } from './SourceTargetResolver'
