const currencyRound = new Intl.NumberFormat('en-GB', {
  style: 'currency',
  currency: 'GBP',
  maximumFractionDigits: 0,
})

const currencyPrecise = new Intl.NumberFormat('en-GB', {
  style: 'currency',
  currency: 'GBP',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
})

export function formatCurrency(amount: number): string {
  return currencyRound.format(amount)
}

export function formatCurrencyPrecise(amount: number): string {
  return currencyPrecise.format(amount)
}

// Half away from zero; never returns -0
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals
  const rounded = Math.round((Math.abs(value) + Number.EPSILON) * factor) / factor
  return value < 0 && rounded !== 0 ? -rounded : rounded
}

export function roundCurrency(value: number): number {
  return roundTo(value, 2)
}
