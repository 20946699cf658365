// Keeps the logger silent and pretty-printing off during Vitest runs.
process.env.NODE_ENV = 'test';
