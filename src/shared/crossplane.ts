export type PackageKind = "Configuration" | "Function" | "Provider";

export interface PackageKindResources {
  kind: PackageKind;
  resource: string;
  revisionResource: string;
  apiVersion: string;
}

export const PACKAGE_KINDS: readonly PackageKindResources[] = [
  {
    kind: "Configuration",
    resource: "configuration.pkg.crossplane.io",
    revisionResource: "configurationrevision.pkg.crossplane.io",
    apiVersion: "pkg.crossplane.io/v1",
  },
  {
    kind: "Function",
    resource: "function.pkg.crossplane.io",
    revisionResource: "functionrevision.pkg.crossplane.io",
    apiVersion: "pkg.crossplane.io/v1",
  },
  {
    kind: "Provider",
    resource: "provider.pkg.crossplane.io",
    revisionResource: "providerrevision.pkg.crossplane.io",
    apiVersion: "pkg.crossplane.io/v1",
  },
];

export const IMAGE_CONFIG_RESOURCE = "imageconfig.pkg.crossplane.io";
export const IMAGE_CONFIG_API_VERSION = "pkg.crossplane.io/v1beta1";
export const LOCK_RESOURCE = "lock.pkg.crossplane.io";
export const LOCK_NAME = "lock";

export function resourcesForKind(kind: PackageKind): PackageKindResources {
  const found = PACKAGE_KINDS.find((entry) => entry.kind === kind);
  if (!found) {
    throw new Error(`Unknown package kind '${kind}'.`);
  }
  return found;
}
