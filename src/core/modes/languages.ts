import type { LanguageTag } from '../entities/Settings.js';

export interface LanguageProfile {
  name: string;
  instruction: string;
}

export const LANGUAGES: { readonly [K in LanguageTag]: LanguageProfile } = {
  en: {
    name: 'English',
    instruction: 'Respond in English.',
  },
  nl: {
    name: 'Nederlands',
    instruction:
      'Antwoord altijd in het Nederlands. Gebruik Nederlandse termen voor elektronica. Antwoord niet in het Engels.',
  },
  de: {
    name: 'Deutsch',
    instruction:
      'Antworten Sie immer auf Deutsch. Verwenden Sie deutsche Fachbegriffe der Elektronik. Nicht auf Englisch antworten.',
  },
  es: {
    name: 'Español',
    instruction:
      'Responde siempre en español. Usa términos técnicos de electrónica en español. No respondas en inglés.',
  },
  fr: {
    name: 'Français',
    instruction:
      "Répondez toujours en français. Utilisez les termes techniques français de l'électronique. Ne répondez pas en anglais.",
  },
  pt: {
    name: 'Português',
    instruction:
      'Responda sempre em português. Use termos técnicos de eletrônica em português. Não responda em inglês.',
  },
};
