// @walletgate/siwe-auth - Sign-In with Ethereum auth service
export { createApp, type AppConfig, type AppContext, type AppDeps } from "./app.js";
export * from "./auth/index.js";
export * from "./chain/index.js";
export * from "./groups/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./storage/index.js";
