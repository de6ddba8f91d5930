export { loadDat, parseDatIdePaths } from './dat.ts'
export { collectModels, type IdeRecord, type IdeSection, loadIde, parseIde } from './ide.ts'
export { compareIgnoreCase, ModelTable } from './models.ts'
