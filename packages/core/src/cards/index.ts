export * from './Card.js';
export * from './Deck.js';
