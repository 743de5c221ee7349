export * from './jsonPlus';
export * from './legacy';
