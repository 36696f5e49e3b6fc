import { describe, expect, it, vi } from 'vitest'
import { ConfigurationError, NotFoundError } from '../../../../src/core/errors.ts'
import type { TPackagesApi } from '../../../../src/domains/packages/packages.api.ts'
import { PackagesFeature } from '../../../../src/domains/packages/packages.feature.ts'
import type { TPackage } from '../../../../src/types/api.ts'
import { makePackage } from '../../../helpers/factories.ts'

function createFeature(packages: TPackage[], organizationId: string | undefined = 'test-org') {
  const api: TPackagesApi = {
    listPackages: vi.fn(async () => packages),
    getPackage: vi.fn(),
    createPackage: vi.fn(),
    deletePackage: vi.fn(),
    postRelease: vi.fn(),
    getReleaseStatus: vi.fn(),
  }
  return new PackagesFeature({ api, organizationId: () => organizationId })
}

describe('PackagesFeature', () => {
  describe('shortName', () => {
    it('strips the organization prefix and lowercases', () => {
      const feature = createFeature([])
      expect(feature.shortName({ name: 'com.Test-Org.Growth' })).toBe('growth')
    })

    it('keeps names from other organizations whole', () => {
      const feature = createFeature([])
      expect(feature.shortName({ name: 'com.other.growth' })).toBe('com.other.growth')
    })
  })

  describe('resolvePackageId', () => {
    it('matches a short name case-insensitively', async () => {
      const feature = createFeature([
        makePackage({ id: 'pk1', name: 'com.test-org.growth' }),
        makePackage({ id: 'pk2', name: 'com.test-org.cloning' }),
      ])

      expect(await feature.resolvePackageId('Cloning')).toBe('pk2')
    })

    it('falls back to a package id', async () => {
      const feature = createFeature([makePackage({ id: 'pk1abc', name: 'com.test-org.growth' })])

      expect(await feature.resolvePackageId('PK1ABC')).toBe('pk1abc')
    })

    it('rejects a short name shared by several packages', async () => {
      const feature = createFeature([
        makePackage({ id: 'pk1', name: 'com.test-org.growth' }),
        makePackage({ id: 'pk2', name: 'com.test-org.GROWTH' }),
      ])

      await expect(feature.resolvePackageId('growth')).rejects.toThrow(
        new ConfigurationError(
          "Found multiple packages matching 'growth': pk1, pk2. Use a package id.",
        ),
      )
    })

    it('throws NotFoundError when nothing matches', async () => {
      const feature = createFeature([makePackage({ id: 'pk1', name: 'com.test-org.growth' })])

      await expect(feature.resolvePackageId('missing')).rejects.toThrow(
        new NotFoundError("The package 'missing' does not exist in your organization."),
      )
    })
  })

  describe('listPackagesByOwner', () => {
    it('splits packages by owner email', async () => {
      const mine = makePackage({ id: 'pk1', owner: { email: 'user@example.com' } })
      const theirs = makePackage({ id: 'pk2', owner: { email: 'other@example.com' } })
      const feature = createFeature([theirs, mine])

      expect(await feature.listPackagesByOwner('user@example.com')).toEqual({
        yours: [mine],
        theirs: [theirs],
      })
    })

    it('treats every package as theirs without an email', async () => {
      const pkg = makePackage({ owner: { email: 'user@example.com' } })
      const feature = createFeature([pkg])

      expect(await feature.listPackagesByOwner(undefined)).toEqual({ yours: [], theirs: [pkg] })
    })
  })
})
