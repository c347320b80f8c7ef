export * from "./Event";
export * from "./Funnel";
export * from "./Filter";
export * from "./View";
