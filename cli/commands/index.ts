export { runGenerate } from './generate.js';
export { runInit } from './init.js';
export { runEval, type EvalResult } from './eval.js';
