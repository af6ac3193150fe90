// Non domain types

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type MenuChoice = 'list' | 'total' | 'order' | 'quit';
