import { getPackageFileReader } from './readPackageFile.js'

interface PackageInfo {
  version: string
}

let packageCache: PackageInfo | undefined = undefined

function isPackageInfo(value: unknown): value is PackageInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  )
}

/**
 * Get the package data
 *
 * @returns the package data
 */
async function getPackageData(): Promise<PackageInfo> {
  if (!packageCache) {
    const packageJson = await getPackageFileReader().readFile(['package.json'])
    const parsed: unknown = JSON.parse(packageJson)
    if (!isPackageInfo(parsed)) {
      throw new Error('package.json does not contain a version')
    }
    packageCache = parsed
  }
  return packageCache
}

/**
 * Get the version of the package
 */
export async function ringQueueVersion(): Promise<string> {
  const data = await getPackageData()
  return data.version
}
