export * from './controller';
export * from './session';
export * from './transitions';
