import {
  InvalidConfigError,
  isStrategyKey,
  strategyConfigs,
  strategyList,
  type Strategy,
  type StrategyConfig,
} from "@steptrade/sdk";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Looks up a bundled strategy and instantiates it. Missing params fall back
 * to the strategy's defaults.
 *
 * @throws InvalidConfigError for an unknown name or invalid params.
 */
export const createStrategy = (name: string, params: unknown = {}): Strategy => {
  const config = findStrategy(name);
  if (!isRecord(params)) {
    throw new InvalidConfigError(`${name} params`, ["(root): Expected an object"]);
  }
  return config.create({ ...config.defaults, ...params });
};

/** @throws InvalidConfigError when `name` is not a bundled strategy. */
export const findStrategy = (name: string): StrategyConfig => {
  if (!isStrategyKey(name)) {
    const known = strategyList.map((config) => config.key).join(", ");
    throw new InvalidConfigError("strategy", [`unknown strategy "${name}"; expected one of ${known}`]);
  }
  return strategyConfigs[name];
};
