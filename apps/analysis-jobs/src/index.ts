export { type AppContext, type AppContextOptions, createAppContext } from "./app/create-context"
export * from "./domains/analysis-jobs"
export { type BuiltServer, buildServer, run } from "./server"
