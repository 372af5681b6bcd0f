/**
 * Core Module - Configuration, Credentials and API Clients
 *
 * @module Core
 */

export * from "./Env";
export * from "./Credentials";
export * from "./ServiceFactory";
