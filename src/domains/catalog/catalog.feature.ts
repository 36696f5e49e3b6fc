import type { TPaymentMethod } from '../../types/api.ts'
import type { CatalogApi } from './catalog.api.ts'

type TCatalogFeatureOptions = {
  api: CatalogApi
}

export type TUsableResource = {
  id: string
  name: string
  vendor: string
}

export class CatalogFeature {
  private api: CatalogApi

  constructor(options: TCatalogFeatureOptions) {
    this.api = options.api
  }

  /**
   * Resources matching the query that can be provisioned from a kit.
   * Reservable kit items are excluded.
   */
  public async findUsableResources(query: string, signal?: AbortSignal): Promise<TUsableResource[]> {
    const resources = await this.api.queryResources(query, signal)
    if (resources.results.length === 0) return []

    let kits = await this.api.queryKits(query, signal)
    if (kits.results.length === 0) {
      kits = await this.api.queryKits(resources.results[0].name, signal)
    }

    const resourceIds = new Set(resources.results.map((resource) => resource.id))
    const usable = new Map<string, TUsableResource>()
    for (const kit of kits.results) {
      for (const item of kit.kit_items) {
        if (!item.provisionable || item.reservable) continue
        if (!resourceIds.has(item.resource.id)) continue
        const vendor = kit.vendor?.name ?? ''
        const key = `${item.resource.id}|${vendor}`
        if (!usable.has(key)) {
          usable.set(key, { id: item.resource.id, name: item.resource.name, vendor })
        }
      }
    }
    return [...usable.values()]
  }

  public async isValidPaymentMethod(paymentMethodId: string, signal?: AbortSignal): Promise<boolean> {
    const methods = await this.api.listPaymentMethods(signal)
    return methods.some((method) => method.id === paymentMethodId && method.is_valid)
  }
}

/** One-line description of a payment method as listed to users. */
export function describePaymentMethod(method: TPaymentMethod): string {
  let description: string
  if (method.type === 'CreditCard') {
    description = `${method.credit_card_type ?? 'Card'} ending with ${method.credit_card_last_4 ?? '????'}`
  } else if (method.type === 'PurchaseOrder') {
    description = `Purchase Order "${method.description ?? ''}"`
  } else {
    description = method.description ?? method.type
  }
  if (method['is_default?']) description += ' (Default)'
  if (!method.is_valid) description += ' (Invalid)'
  return description
}
