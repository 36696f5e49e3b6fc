/**
 * Minimal session cookie store for the API host. Only `name=value` pairs are
 * kept; attributes are ignored except `Max-Age=0` / past `Expires`, which
 * delete the cookie.
 */
export class CookieJar {
  private cookies: Map<string, string> = new Map()

  constructor(initial?: string) {
    if (initial) this.setFromHeader(initial)
  }

  /** Seeds the jar from a `Cookie` request header value (`a=1; b=2`). */
  setFromHeader(header: string): void {
    for (const pair of header.split(';')) {
      const [name, value] = splitPair(pair)
      if (name) this.cookies.set(name, value)
    }
  }

  storeFromResponse(headers: Headers): void {
    for (const setCookie of headers.getSetCookie()) {
      const [first, ...attributes] = setCookie.split(';')
      const [name, value] = splitPair(first ?? '')
      if (!name) continue
      if (isExpired(attributes)) {
        this.cookies.delete(name)
      } else {
        this.cookies.set(name, value)
      }
    }
  }

  toHeader(): string | undefined {
    if (this.cookies.size === 0) return undefined
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ')
  }

  clear(): void {
    this.cookies.clear()
  }
}

function splitPair(pair: string): [string, string] {
  const index = pair.indexOf('=')
  if (index === -1) return [pair.trim(), '']
  return [pair.slice(0, index).trim(), pair.slice(index + 1).trim()]
}

function isExpired(attributes: string[]): boolean {
  for (const attribute of attributes) {
    const [key, value] = splitPair(attribute)
    const lowered = key.toLowerCase()
    if (lowered === 'max-age' && Number(value) <= 0) return true
    if (lowered === 'expires') {
      const expiresAt = Date.parse(value)
      if (!Number.isNaN(expiresAt) && expiresAt <= Date.now()) return true
    }
  }
  return false
}
