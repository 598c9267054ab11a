export {
	EnvConfigurationProvider,
	envVarName,
	JsonFileConfigurationProvider,
	StaticConfigurationProvider,
} from "./providers";
export {
	type ConfigurationProvider,
	type RawSettings,
	SETTING_KEYS,
	type SettingKey,
	type SyncConfiguration,
} from "./types";
export { isExplicitlyDisabled, loadSyncConfiguration, parseBooleanSetting } from "./validate";
