export * from './diceEngine';
export * from './playerEngine';
export * from './zoneEngine';
export * from './turnEngine';
export * from './victoryEngine';
export * from './gameEngine';
export * from './reportingEngine';
