import { wordRegExp } from '../../utils/text.js';

const TEMPORAL_REFERENCE_RE = wordRegExp(
  String.raw`\b(` +
    String.raw`hoy|manana|mañana|pasado\s+manana|pasado\s+mañana|ayer|` +
    String.raw`actual|actualmente|ahora|esta\s+semana|este\s+mes|este\s+ano|este\s+año|` +
    String.raw`lunes|martes|miercoles|miércoles|jueves|viernes|sabado|sábado|domingo|` +
    String.raw`\d{1,2}:\d{2}|\d{1,2}\s*(?:am|pm)` +
    String.raw`)\b`
);

/** True when the text anchors on "now": relative days, weekdays, clock times. */
export function hasTemporalReference(text: string): boolean {
  return TEMPORAL_REFERENCE_RE.test(text);
}
