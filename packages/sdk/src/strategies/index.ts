export * as smaCrossover from "./sma_crossover.js";
export * as macd from "./macd.js";
export * as dualThrust from "./dual_thrust.js";
export * as buyAndHold from "./buy_and_hold.js";
