import type { InstantInput } from "../time/instant.js";

export type RealizedReturn = {
  symbol: string;
  /** ISO-8601 UTC instant the horizon starts from. */
  asOf: string;
  horizonMinutes: number;
  priceStart: number;
  priceEnd: number;
  realizedReturn: number;
};

export type RealizedReturnInput = {
  symbol: string;
  asOf: InstantInput;
  horizonMinutes: number;
  priceStart: number;
  priceEnd: number;
};

export type OutcomeSeriesKey = {
  symbol: string;
  horizonMinutes: number;
};

export type OutcomeWindowQuery = OutcomeSeriesKey & {
  start: InstantInput;
  end: InstantInput;
};

export type OutcomeBeforeQuery = OutcomeSeriesKey & {
  /** Exclusive upper bound. */
  before: InstantInput;
  /** Inclusive lower bound. */
  since?: InstantInput;
};

export type OutcomeExactQuery = OutcomeSeriesKey & {
  asOf: InstantInput;
};

export type InsertResult = {
  inserted: number;
  skipped: number;
};

/** Read surface that a causal view can safely expose. */
export type RealizedOutcomeReader = {
  listInWindow: (query: OutcomeWindowQuery) => Promise<RealizedReturn[]>;
  listBefore: (query: OutcomeBeforeQuery) => Promise<RealizedReturn[]>;
  listAsOfDates: (query: OutcomeWindowQuery) => Promise<string[]>;
};

export type RealizedOutcomeStore = RealizedOutcomeReader & {
  insertMany: (inputs: RealizedReturnInput[]) => Promise<InsertResult>;
  getExact: (query: OutcomeExactQuery) => Promise<RealizedReturn | null>;
};
