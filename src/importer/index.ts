export { importTypeScript, convertTypeNode } from "./typescript"
export type { ImportOptions } from "./typescript"
