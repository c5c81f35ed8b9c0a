/**
 * Package resolution exports.
 *
 * @module packages
 */

export {
  resolvePackages,
  listGoStdPackages,
  parseStdListing,
  isInternalOrVendorPackage,
  STD_KEYWORD,
  type PackageInput,
  type PackageLister,
  type ListStdOptions,
  type ResolveDependencies,
} from './resolve.js';
