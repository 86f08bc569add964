export * from "./cpu";
export * from "./filesystem";
export * from "./memory";
export * from "./network";
export * from "./quakes";
