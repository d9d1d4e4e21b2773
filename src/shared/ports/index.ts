export * from './billing-sync.port';
export * from './notification.port';
