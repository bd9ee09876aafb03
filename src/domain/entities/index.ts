export * from './Account.js';
export * from './Beneficiary.js';
export * from './Document.js';
export * from './Payment.js';
export * from './Profile.js';
export * from './Transaction.js';
export * from './Transfer.js';
