// Library entry: engine, strategies and the experiment harness.

export * from "./engine";
export * from "./strategy";
export * from "./experiment";
