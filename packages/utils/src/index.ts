export * from './strings'
