export * from './user-mocks';
export * from './event-mocks';
