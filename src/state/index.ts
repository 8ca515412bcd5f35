export * from './market-state'
export * from './marquee'
