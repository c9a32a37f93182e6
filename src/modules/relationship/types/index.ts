export * from './relationship-status';
export * from './friend-request.types';
