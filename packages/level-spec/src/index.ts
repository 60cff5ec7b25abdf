export * from './ldtk';
export * from './enemy';
export * from './level';
