export * from './math';
export * from './physics/shapes';
export * from './physics/layers';
export * from './physics/world';
export * from './collision-grid';
export * from './tileset-atlas';
export * from './animation';
export * from './controller';
export * from './lorentz';
export * from './input';
export * from './wander';
export * from './sprite-state';
export * from './enemies';
export * from './spawn';
export * from './game';
