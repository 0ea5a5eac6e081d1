export * from './convotrack';
