/**
 * Test utilities index
 */

export * from "./fixtures/domains";
export * from "./fixtures/events";
export * from "./helpers";
export * from "./mocks/dns";
export * from "./mocks/probes";
export * from "./mocks/storage";
