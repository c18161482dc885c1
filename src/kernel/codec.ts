import type { CommandPair, DecodedCondition, DecodedVocab } from './types.js';

export const VOCAB_RADIX = 150;
export const CONDITION_RADIX = 20;
export const COMMAND_RADIX = 150;

export const decodeVocab = (value: number): DecodedVocab => ({
  verb: Math.floor(value / VOCAB_RADIX),
  noun: value % VOCAB_RADIX,
});

export const encodeVocab = (verb: number, noun: number): number => verb * VOCAB_RADIX + noun;

export const decodeCondition = (value: number): DecodedCondition => ({
  code: value % CONDITION_RADIX,
  parameter: Math.floor(value / CONDITION_RADIX),
});

export const encodeCondition = (code: number, parameter: number): number => parameter * CONDITION_RADIX + code;

export const decodeCommandPair = (value: number): CommandPair => ({
  first: Math.floor(value / COMMAND_RADIX),
  second: value % COMMAND_RADIX,
});

export const encodeCommandPair = (first: number, second: number): number => first * COMMAND_RADIX + second;

export const computeChecksum = (numActions: number, numItems: number, version: number): number =>
  2 * numActions + numItems + version;
