export { loadEnv, type AppEnv, type NodeEnv } from './env.js';
