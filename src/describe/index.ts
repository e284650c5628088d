// Configuration
export { ExportStyleSchema, GeneratorConfigSchema, PRETTIFY_TYPE, resolveConfig } from "./types"
export type { ExportStyle, GeneratorConfig, RenderedUnit, ResolvedConfig } from "./types"

// Registry
export { TypeRegistry, GLOBAL_TYPE_NAMES } from "./registry"

// TypeScript output
export { registryToTypescript, registryToModules, modulePath } from "./typescript"

// Dependency graph
export { buildDependencyGraph, topologicalOrder, collectTypeDependencies } from "./dependencies"
export type { DependencyGraph } from "./dependencies"

// Process-wide catalog
export { TypeCatalog, catalog, declareType, collectDeclaredTypes } from "./catalog"
export type { CatalogEntry } from "./catalog"
