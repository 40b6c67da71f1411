/**
 * Paper venue
 */

export { PaperExchange } from "./paper-exchange";
export { createSeededRandom } from "./random";
export type { RandomSource } from "./random";
export type { PaperExchangeConfig, PaperInstrumentConfig, RestingOrder } from "./types";
