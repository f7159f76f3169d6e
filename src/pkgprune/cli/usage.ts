export function pkgPruneUsage(): string {
  return [
    "Usage:",
    "  pkgprune (--name NAME | --repo ORG/REPO | --path DIR) [options]",
    "",
    "Options:",
    "  --name NAME           Configuration resource to remove",
    "  --repo ORG/REPO       Remove the Configuration named <org>-<repo>",
    "  --path DIR            Remove the Configurations built into DIR/_output/*.uppkg",
    "  --dry-run             Print the resolved targets and prune plan and exit",
    "  --help, -h            Show this help",
    "",
    "Examples:",
    "  pkgprune --repo my-org/my-config",
    "  pkgprune --path ./my-config --dry-run",
    "  pkgprune --name my-config",
  ].join("\n");
}
