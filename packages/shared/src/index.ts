export * from './currency';
export * from './calendar-date';
export * from './types/fx.types';
