/**
 * Branded types used across packages.
 */

declare const AbsolutePathBrand: unique symbol
declare const RepoNameBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>
export type RepoName = Brand<string, typeof RepoNameBrand>
