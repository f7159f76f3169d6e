export function pkgSyncUsage(): string {
  return [
    "Usage:",
    "  pkgsync [--path DIR | --repo ORG/REPO [--version TAG] | --output DIR] [options]",
    "",
    "Options:",
    "  --path DIR            Package project to build and sync (default: .)",
    "  --repo ORG/REPO       Clone a GitHub repository, then build and sync it",
    "  --version TAG         With --repo: apply ghcr.io/ORG/REPO:TAG without building",
    "  --output DIR          Sync .uppkg artifacts already in DIR, skipping the build",
    "  --dry-run             Print the structured sync plan and exit",
    "  --help, -h            Show this help",
    "",
    "Environment:",
    "  PKGSYNC_PUSH_REGISTRY       Registry address for docker push (default: localhost:30500)",
    "  PKGSYNC_PULL_REGISTRY       Registry address seen from the cluster",
    "  PKGSYNC_REGISTRY_NAMESPACE  Namespace of the registry deployment (default: crossplane-system)",
    "  PKGSYNC_POLL_INTERVAL_MS    Delay between readiness checks (default: 2000)",
    "  PKGSYNC_LOG_LEVEL           Log level: debug | info | warn | error (default: info)",
    "",
    "Examples:",
    "  pkgsync --path ./my-config --dry-run",
    "  pkgsync --repo my-org/my-config",
    "  pkgsync --repo my-org/my-config --version v1.2.0",
    "  pkgsync --output ./my-config/_output",
  ].join("\n");
}
