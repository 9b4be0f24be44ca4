export * from './app';
export * from './middleware';
export * from './routes/customers';
