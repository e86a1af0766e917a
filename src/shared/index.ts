export * from './engine';
export * from './ai';
export { SeededRNG, createSeededSource, type RandomSource } from './utils/rng';
