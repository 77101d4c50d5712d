export * from './graph'
export * from './settings'
