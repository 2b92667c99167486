// HTML helpers for innerHTML templates

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => ESCAPES[ch] ?? ch);
}

/** Clock text for the desktop corner: "9:05 AM". */
export function formatClock(hours: number, minutes: number): string {
  const h = hours % 12 || 12;
  const m = minutes.toString().padStart(2, '0');
  return `${h}:${m} ${hours % 24 >= 12 ? 'PM' : 'AM'}`;
}
