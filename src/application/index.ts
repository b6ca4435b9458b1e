/**
 * Application Layer
 *
 * Use cases for reading and writing users.
 */

export * from "./user-use-cases.js";
