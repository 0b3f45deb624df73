export * from './dice';
export * from './game';
export * from './decisions';
export * from './reporting';
export * from './gameDefinitionConsts';
