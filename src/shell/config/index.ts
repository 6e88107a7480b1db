export {
	CONFIG_PATH_ENV,
	isEnvFlagSet,
	type LoadConfigOptions,
	loadConfig,
	parseConfigInput,
	resolveConfig,
	VERBOSE_ENV,
} from "./loader.js";
