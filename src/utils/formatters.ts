export const formatAmount = (value: number): string =>
  Math.trunc(value)
    .toString()
    .replace(/\B(?=(\d{3})+(?!\d))/g, ' ');

export const formatMoney = (value: number): string => `${formatAmount(value)} ₽`;

export const escapeHtml = (value: string): string =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

export const padOrdinal = (value: number): string => value.toString().padStart(2, '0');
