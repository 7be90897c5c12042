export { loadSettings, SettingsSchema } from './settings.js'
export type { Settings } from './settings.js'
