const currencyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** Renders an amount as `$68,000.00`; negative amounts as `-$1,500.00`. */
export function formatCurrency(amount: number): string {
  const formatted = currencyFormat.format(Math.abs(amount));
  return amount < 0 ? `-$${formatted}` : `$${formatted}`;
}

/** `2024-06-15 14:30:00`, local time. */
export function formatDateTime(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
