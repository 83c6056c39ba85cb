export * from './logger';
export * from './jsonl-writer';
