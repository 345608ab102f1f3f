export { loadConfig, type AppConfig } from "./config.js";
