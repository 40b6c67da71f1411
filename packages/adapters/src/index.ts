/**
 * packages/adapters - Venue Adapters
 *
 * - Port interfaces for venue-agnostic trading
 * - In-process paper venue
 */

// Port interfaces
export * from "./ports";

// Paper venue
export * from "./paper";
