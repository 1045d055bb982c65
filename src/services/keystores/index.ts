export * from './types'
export * from './keystores'
export * from './fromText'
