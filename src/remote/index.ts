export * from './types';
export * as Ssh from './ssh';
