export * from './lib/wg-api-client.module';
export * from './lib/wg-api-client.service';
export * from './lib/wg-payload';
