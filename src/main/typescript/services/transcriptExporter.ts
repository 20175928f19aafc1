/**
 * INPUT: conversation turns + language
 * OUTPUT: transcript as plain text, or as PDF bytes
 * POS: service layer, conversation export; PDF is drawn with pdf-lib on Helvetica
 */

import { PDFDocument, PDFFont, rgb, StandardFonts } from 'pdf-lib';
import { TurnSender } from '../models/enums';
import { ConversationTurn, Language } from '../models/types';

export const TRANSCRIPT_TITLE = '=== Conversation Contrée Coach ===';

const SENDER_LABELS: Record<Language, Record<TurnSender, string>> = {
  fr: { [TurnSender.USER]: 'Vous', [TurnSender.SYSTEM]: 'Coach' },
  en: { [TurnSender.USER]: 'You', [TurnSender.SYSTEM]: 'Coach' },
};

/** A4 portrait, in points */
const PAGE_WIDTH = 595;
const PAGE_HEIGHT = 842;
const MARGIN = 50;
const FONT_SIZE = 11;
const LINE_HEIGHT = 15;

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function exportTranscriptText(turns: readonly ConversationTurn[], language: Language, now = new Date()): string {
  const lines = [TRANSCRIPT_TITLE, `Date: ${formatDate(now)}`, ''];
  for (const turn of turns) {
    lines.push(`${SENDER_LABELS[language][turn.sender]}: ${turn.content}`, '');
  }
  return lines.join('\n');
}

// ─── PDF ──────────────────────────────────────────────────────

/** Drops characters the font cannot encode, and markdown bold markers */
export function toEncodable(text: string, charset: ReadonlySet<number>): string {
  return Array.from(text.replace(/\*\*/g, ''))
    .filter((ch) => {
      const code = ch.codePointAt(0);
      return code !== undefined && charset.has(code);
    })
    .join('');
}

/** Greedy word wrap by rendered width; over-long words are split */
export function wrapLine(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  if (!text) return [''];
  const out: string[] = [];
  let current = '';
  for (const word of text.split(' ')) {
    const candidate = current ? `${current} ${word}` : word;
    if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
      current = candidate;
      continue;
    }
    if (current) out.push(current);
    current = word;
    while (font.widthOfTextAtSize(current, size) > maxWidth && current.length > 1) {
      let cut = current.length - 1;
      while (cut > 1 && font.widthOfTextAtSize(current.slice(0, cut), size) > maxWidth) cut--;
      out.push(current.slice(0, cut));
      current = current.slice(cut);
    }
  }
  out.push(current);
  return out;
}

export async function exportTranscriptPdf(
  turns: readonly ConversationTurn[],
  language: Language,
  now = new Date(),
): Promise<Uint8Array> {
  const pdfDoc = await PDFDocument.create();
  pdfDoc.setTitle('Conversation Contrée Coach');
  const font = await pdfDoc.embedFont(StandardFonts.Helvetica);
  const charset = new Set(font.getCharacterSet());
  const maxWidth = PAGE_WIDTH - 2 * MARGIN;

  const lines = exportTranscriptText(turns, language, now)
    .split('\n')
    .flatMap((line) => wrapLine(toEncodable(line, charset), font, FONT_SIZE, maxWidth));

  let page = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  let y = PAGE_HEIGHT - MARGIN;
  for (const line of lines) {
    if (y < MARGIN) {
      page = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      y = PAGE_HEIGHT - MARGIN;
    }
    if (line) page.drawText(line, { x: MARGIN, y, size: FONT_SIZE, font, color: rgb(0, 0, 0) });
    y -= LINE_HEIGHT;
  }

  return pdfDoc.save();
}
