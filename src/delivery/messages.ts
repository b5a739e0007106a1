/**
 * NewsRelay — Message Rendering
 *
 * Telegram HTML for the two kinds of delivered items.
 */

import type { MatchRecord, ReferenceItem } from '../types/news';

export interface DeliverableItem {
  url: string;
  renderMessage(): string;
}

export interface MessageLabels {
  /** Shown in the portal read-more link */
  portal: string;
  /** Shown in the aggregator read-more link */
  aggregator: string;
}

export const DEFAULT_LABELS: MessageLabels = {
  portal: 'mos.ru',
  aggregator: 'Дзен',
};

const AGGREGATOR_BANNER = '<b>ТОП ДЗЕНА:</b>';
const SHOWN_KEYWORDS = 3;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function renderPortalMessage(item: ReferenceItem, labels: MessageLabels = DEFAULT_LABELS): string {
  let message = `📰 <b>${escapeHtml(item.title)}</b>\n`;
  if (item.snippet) {
    message += `${escapeHtml(item.snippet)}\n\n`;
  }
  message += `📎 <a href="${escapeHtml(item.url)}">Читать на ${escapeHtml(labels.portal)}</a>`;
  return message;
}

export function renderAggregatorMessage(record: MatchRecord, labels: MessageLabels = DEFAULT_LABELS): string {
  let message = `${AGGREGATOR_BANNER}\n📰 <b>${escapeHtml(record.title)}</b>\n`;

  if (record.matchType === 'semantic' && record.sourceUrl) {
    const sourceTitle = record.sourceTitle ?? record.sourceUrl;
    message += `\n<b>Первоисточник:</b> <a href="${escapeHtml(record.sourceUrl)}">${escapeHtml(sourceTitle)}</a>\n`;
    if (record.similarityScore !== undefined) {
      message += `<i>Схожесть: ${record.similarityScore.toFixed(2)}</i>\n`;
    }
  } else if (record.matchedKeywords.length > 0) {
    const shown = record.matchedKeywords.slice(0, SHOWN_KEYWORDS).map(escapeHtml).join(', ');
    message += `\n<i>Ключевые слова: ${shown}</i>\n`;
  }

  message += `\n📎 <a href="${escapeHtml(record.url)}">Читать на ${escapeHtml(labels.aggregator)}</a>`;
  return message;
}

export function portalDeliverable(item: ReferenceItem, labels?: MessageLabels): DeliverableItem {
  return { url: item.url, renderMessage: () => renderPortalMessage(item, labels) };
}

export function aggregatorDeliverable(record: MatchRecord, labels?: MessageLabels): DeliverableItem {
  return { url: record.url, renderMessage: () => renderAggregatorMessage(record, labels) };
}
