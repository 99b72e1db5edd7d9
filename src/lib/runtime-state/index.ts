export * from "./context-store"
export * from "./coordinator"
export * from "./rate-limiter"
export * from "./stats-counter"
export * from "./types"
