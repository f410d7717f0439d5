// Public surface of the dice expression library
export * from './math/schemas.js';
export * from './math/errors.js';
export * from './math/random.js';
export * from './math/parser.js';
export * from './math/roll.js';
export * from './math/evaluator.js';
export * from './math/range.js';
export * from './math/dice.js';
export * from './math/export.js';
