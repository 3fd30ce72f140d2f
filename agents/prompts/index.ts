export * from './analyst'
export * from './validator'
export * from './intelligence-hub'
