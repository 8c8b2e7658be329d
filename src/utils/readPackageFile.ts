import { createPackageFileReader, type PackageFileReader } from '@cloud-copilot/cli'

// src/utils and dist/utils are both two levels below the package root
const levels = 2

let fileReader: PackageFileReader | undefined = undefined

export function getPackageFileReader(): PackageFileReader {
  if (!fileReader) {
    fileReader = createPackageFileReader(import.meta.url, levels)
  }
  return fileReader
}
