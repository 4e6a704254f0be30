export * from './lib/clan.interface';
export * from './lib/lookup-outcome.interface';
