const usd = new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
});

/**
 * 7300 → "$7,300.00"
 */
export function formatCurrency(amount: number): string {
    return usd.format(amount);
}

/**
 * 66.666 → "66.7%"
 */
export function formatPercentage(value: number): string {
    return `${value.toFixed(1)}%`;
}

/**
 * Title-case a lowercase publisher key for display: "taylor & francis" → "Taylor & Francis".
 */
export function displayPublisher(publisher: string): string {
    return publisher.replace(/\b\w/g, (c) => c.toUpperCase());
}
