export { runDemo, DEMO_FILES, DEMO_QUERIES, type DemoOptions, type DemoSummary } from './demo';
export { buildProgram } from './cli';
