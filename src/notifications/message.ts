import { formatMoney } from '../utils/price.js';

export interface PriceDropAlert {
  productName: string;
  oldPrice: number;
  newPrice: number;
  currency: string;
  /** Where to buy at the new price */
  url?: string;
}

export interface AlertMessage {
  subject: string;
  text: string;
  html: string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Saving in money and as a percentage of the old price (one decimal)
 */
export function priceDrop(oldPrice: number, newPrice: number): { amount: number; percent: number } {
  const amount = Math.round((oldPrice - newPrice) * 100) / 100;
  const percent = oldPrice > 0 ? Math.round((amount / oldPrice) * 1000) / 10 : 0;
  return { amount, percent };
}

export function buildAlertMessage(alert: PriceDropAlert): AlertMessage {
  const { amount, percent } = priceDrop(alert.oldPrice, alert.newPrice);
  const oldPrice = formatMoney(alert.oldPrice, alert.currency);
  const newPrice = formatMoney(alert.newPrice, alert.currency);
  const saving = formatMoney(amount, alert.currency);

  const lines = [
    'Price Drop Alert!',
    '',
    alert.productName,
    '',
    `Price dropped from ${oldPrice} to ${newPrice}`,
    `You save ${saving} (${percent.toFixed(1)}% off)`,
  ];
  if (alert.url) {
    lines.push('', `View deal: ${alert.url}`);
  }

  const link = alert.url
    ? `<p><a href="${escapeHtml(alert.url)}">View deal</a></p>`
    : '';

  return {
    subject: `Price Drop: ${alert.productName}`,
    text: lines.join('\n'),
    html: `<h2>Price Drop Alert!</h2>
<p><strong>${escapeHtml(alert.productName)}</strong></p>
<p>Price dropped from <s>${oldPrice}</s> to <strong>${newPrice}</strong></p>
<p>You save ${saving} (${percent.toFixed(1)}% off)</p>
${link}`,
  };
}
