export { type CheckResult, checkUnit } from './checker.ts'
export { classifyArg, type ScanResult, scanUnit } from './scanner.ts'
