/********* BASIC TYPES *********/
export type Domain = number;
export type Address = string;
export type HexString = string;

// Amounts are integer minor units, never floating point
export type Amount = bigint;
