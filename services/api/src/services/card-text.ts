import type { PropertyCard } from '@propquery/shared';

const CARD_WIDTH = 78;

/** Cut to width and pad with spaces */
function cell(text: string, width: number): string {
  return text.slice(0, width).padEnd(width);
}

/**
 * Box-drawn text rendering of a card for terminal output.
 * @param index - 1-based position in the result list
 */
export function formatCardLines(card: PropertyCard, index: number): string[] {
  const rule = '─'.repeat(CARD_WIDTH);
  return [
    `#${index}`,
    `┌${rule}┐`,
    `│ ${cell(card.title, 74)} │`,
    `├${rule}┤`,
    `│ 📍 ${cell(card.location, 72)} │`,
    `│ 🏠 ${cell(card.bhk, 20)} │ 💰 ${cell(card.price, 20)} │ 📐 ${cell(card.carpetArea, 17)} │`,
    `│ 🔑 Status: ${cell(card.status, 30)} │ 🛋️  ${cell(card.furnishing, 25)} │`,
    `│ ✨ ${cell(card.amenities.join(', '), 72)} │`,
    `│ 🔗 ${cell(card.url, 74)} │`,
    `└${rule}┘`,
  ];
}
