import type { Phrase } from "./core.js";

const SEED_TEXTS: ReadonlyArray<readonly [text: string, difficulty: string]> = [
  ["La sombra avanzaba silenciosa por el pasillo.", "media"],
  ["Al abrir la puerta, nadie respondió al llamado.", "baja"],
  ["El susurro decía mi nombre al oído sin moverse nadie.", "media"],
  ["Las luces titilaron y la figura estaba ya detrás de mí.", "alta"],
  ["No había teléfonos en la casa, pero alguien marcó desde adentro.", "media"],
  ["Encontré una nota en mi almohada que decía: vuelve a dormir.", "baja"],
  ["El espejo reflejó una habitación que no era la mía.", "media"],
  ["Cada vez que parpadeaba, alguien estaba más cerca.", "alta"],
  ["La casa respiraba y yo no estaba dentro de ella.", "alta"],
  ["Las marcas en la pared formaban mi nombre, escrito de atrás hacia adelante.", "alta"],
];

/** Phrases the local in-memory store starts with. */
export const SEED_PHRASES: readonly Phrase[] = SEED_TEXTS.map(([text, difficulty], index) => ({
  id: `seed_${index}`,
  text,
  difficulty,
  category: "terror",
}));
