import { CatalogItem } from '../services/catalog.service';
import { FunnelStage } from '../types/conversation';

const BASE_PROMPT = `Eres un asesor de ventas que atiende por WhatsApp. Tu trabajo es resolver dudas y acercar al cliente a una visita, no presionar.

REGLAS:
- Máximo 2 oraciones por mensaje.
- Solo saluda con "Hola" en el primer turno.
- Nunca inventes precios, existencias ni especificaciones: usa solo el INVENTARIO.
- Si no sabes algo: "Eso lo confirmo y te aviso."
- No cambies de modelo sin que el cliente lo pida.
- Si piden fotos responde "Claro, aquí tienes." (el sistema adjunta las fotos).
- Los domingos no hay citas.
- PROHIBIDO: emojis, explicaciones largas, formato markdown para links.`;

const OUTPUT_FORMAT = `FORMATO DE RESPUESTA:
Responde SOLO con un objeto JSON, sin texto adicional:
{"reply": "<mensaje para el cliente>", "intent": {"model": "<modelo del inventario que le interesa o null>", "appointment": {"confirmed": <true|false>, "when": "<día y hora o null>"} o null, "customerName": "<nombre o null>", "wantsPhotos": <true|false>}}
- "model" solo si el cliente mencionó o aceptó un modelo del inventario.
- "appointment.confirmed" solo es true cuando el cliente aceptó explícitamente día y hora.`;

export interface BusinessInfo {
  name?: string;
  hours?: string;
  location?: string;
}

export interface ConversationContext {
  turnCount: number;
  stage: FunnelStage;
  now: string;
  customerName?: string;
}

export function formatCatalog(items: readonly CatalogItem[]): string {
  if (items.length === 0) {
    return 'INVENTARIO: no disponible por el momento. No menciones precios.';
  }

  const lines = items.map((item) => {
    const parts = [`${item.brand} ${item.model} ${item.year}`.trim()];
    if (item.color) parts.push(item.color);
    if (item.price) parts.push(`$${item.price}${item.currency ? ` ${item.currency}` : ''}`);
    if (item.description) parts.push(item.description);
    parts.push(item.photos.length > 0 ? `${item.photos.length} fotos` : 'sin fotos');
    return `- ${parts.join(' | ')}`;
  });

  return `INVENTARIO:\n${lines.join('\n')}`;
}

export function buildSystemPrompt(
  business: BusinessInfo,
  context: ConversationContext,
  catalog: readonly CatalogItem[]
): string {
  const parts: string[] = [BASE_PROMPT];

  const businessSection: string[] = [];
  if (business.name) businessSection.push(`Trabajas en ${business.name}.`);
  if (business.hours) businessSection.push(`Horario: ${business.hours}.`);
  if (business.location) businessSection.push(`Ubicación: ${business.location}`);
  if (businessSection.length > 0) {
    parts.push(`\nNEGOCIO:\n${businessSection.join('\n')}`);
  }

  const contextSection = [
    `Fecha y hora actual: ${context.now}`,
    `Turno: ${context.turnCount}`,
    `Etapa del cliente: ${context.stage}`,
  ];
  if (context.customerName) contextSection.push(`Cliente: ${context.customerName}`);
  parts.push(`\nCONTEXTO:\n${contextSection.join('\n')}`);

  parts.push(`\n${formatCatalog(catalog)}`);
  parts.push(`\n${OUTPUT_FORMAT}`);

  return parts.join('\n');
}

/** WhatsApp renders plain URLs only: `[text](url)` becomes `text: url`. */
export function stripMarkdownLinks(text: string): string {
  return text.replace(/\[([^\]]+)\]\((https?:\/\/[^)\s]+)\)/g, '$1: $2');
}
