export * from './relationship-store.interface';
export * from './user-directory.interface';
