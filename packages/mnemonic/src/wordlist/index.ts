export { Wordlist } from './wordlist.js';
export { getWordlist, getAvailableLanguages, isLanguageAvailable } from './registry.js';
