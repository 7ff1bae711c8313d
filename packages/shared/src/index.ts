export * from './types/payment';
export * from './schemas/payment';
export * from './utils/amount';
export * from './utils/constants';
export * from './utils/status';
export * from './utils/validation';
