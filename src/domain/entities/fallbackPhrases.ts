import type { Phrase } from "../ports/PersistenceGateway.js";

const FALLBACK_TEXTS = [
  "La sombra avanzaba silenciosa por el pasillo.",
  "El espejo reflejó una habitación que no era la mía.",
  "Cada vez que parpadeaba, alguien estaba más cerca.",
  "Las luces titilaron y la figura estaba ya detrás de mí.",
  "Encontré una nota que decía: vuelve a dormir.",
  "El susurro decía mi nombre detrás de la puerta.",
  "Al abrir la puerta, nadie respondió al llamado.",
] as const;

export const FALLBACK_PHRASES: readonly Phrase[] = FALLBACK_TEXTS.map((text, index) => ({
  id: `local_${index}`,
  text,
  difficulty: "media",
  category: "terror",
}));
