export * from '@/lib/oui'
export * from '@/lib/errors'
export type { OuiConfig } from '@/lib/config'
export { getConfig, DEFAULT_OUI_CONFIG, DEFAULT_REGISTRY_PATH } from '@/lib/config'
export { createConsoleLogger } from '@/lib/logger'
