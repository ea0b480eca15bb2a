export type OrderLine = {
  sku: string
  quantity: number
  /** In cents */
  unitPrice: number
}

export type LineFailure = {
  line: number
  raw: string
}
