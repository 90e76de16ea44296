export * from "./arena.domain";
export { StateArena, MAX_ADDRESSABLE_STATES } from "./arena";
export * from "./domain";
export * from "./errors";
export * from "./monitor.domain";
export { SuffixAutomatonMonitor, NoOpSuffixAutomatonMonitor } from "./monitor";
export { QueryEngine } from "./query-engine";
export { SuffixAutomaton } from "./suffix-automaton";
export { SuffixAutomatonStream } from "./suffix-automaton-stream";
export * from "./symbols";
