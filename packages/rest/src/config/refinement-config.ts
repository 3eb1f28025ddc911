/**
 * Refinement limits, read through Effect's Config module so they can come
 * from the environment or any ConfigProvider.
 *
 * | Key                        | Default |
 * | -------------------------- | ------- |
 * | TRELLIS_DEFAULT_PER_PAGE   | 25      |
 * | TRELLIS_MAX_LIMIT          | 1000    |
 * | TRELLIS_MAX_DEPTH          | 5       |
 *
 * @module
 */

import { Config, type ConfigError, Effect } from "effect";

export interface RefinementConfig {
	/** `per_page` used when a request gives `page` alone */
	readonly defaultPerPage: number;

	/** Upper bound applied to `limit` and `per_page` */
	readonly maxLimit: number;

	/** Deepest association path the classifier follows */
	readonly maxDepth: number;
}

export const defaultRefinementConfig: RefinementConfig = {
	defaultPerPage: 25,
	maxLimit: 1000,
	maxDepth: 5,
};

const positiveInteger = (name: string, fallback: number) =>
	Config.integer(name).pipe(
		Config.validate({
			message: "Expected a positive integer",
			validation: (n) => n > 0,
		}),
		Config.withDefault(fallback),
	);

export const refinementConfig: Config.Config<RefinementConfig> = Config.all({
	defaultPerPage: positiveInteger(
		"TRELLIS_DEFAULT_PER_PAGE",
		defaultRefinementConfig.defaultPerPage,
	),
	maxLimit: positiveInteger(
		"TRELLIS_MAX_LIMIT",
		defaultRefinementConfig.maxLimit,
	),
	maxDepth: positiveInteger(
		"TRELLIS_MAX_DEPTH",
		defaultRefinementConfig.maxDepth,
	),
});

/**
 * Load the refinement config from the current ConfigProvider.
 */
export const loadRefinementConfig: Effect.Effect<
	RefinementConfig,
	ConfigError.ConfigError
> = Effect.gen(function* () {
	const config = yield* refinementConfig;
	if (config.defaultPerPage > config.maxLimit) {
		yield* Effect.logWarning(
			`TRELLIS_DEFAULT_PER_PAGE (${config.defaultPerPage}) exceeds TRELLIS_MAX_LIMIT (${config.maxLimit}); pages will be capped`,
		);
	}
	return config;
});
