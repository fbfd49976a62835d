export const name = '@leakscan/core';

export * from './config/loader';
export * from './scan';
