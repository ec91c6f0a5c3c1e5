export { CONFIG_FILE, ENV_PREFIX, type LoadAppConfigOptions, loadAppConfig } from "./load-app-config"
export { type Settings, settingsSchema } from "./schema"
