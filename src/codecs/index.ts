export * from './decodeResult';
export * from './user.codec';
export * from './account.codec';
export * from './transaction.codec';
