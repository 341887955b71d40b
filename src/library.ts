/**
 * Policy Gate — Built-in Policy Library
 *
 * Ready-made policy documents for common security gates. Each template is
 * plain data and loads through `parsePolicyDocument`.
 */

import type { PolicyDocument } from "./loader.js";

export interface LibraryPolicy {
  id: string;
  name: string;
  description: string;
  category: string;
  template: PolicyDocument;
}

export const POLICY_LIBRARY: LibraryPolicy[] = [
  // ── Data protection ───────────────────────────────────────────
  {
    id: "data-protection",
    name: "Data Protection at Rest and in Transit",
    description: "Require encryption and TLS for storage holding classified data",
    category: "data-protection",
    template: {
      id: "data-protection",
      name: "Data Protection at Rest and in Transit",
      version: "1",
      description: "Storage resources must be encrypted, and confidential data must use customer-managed keys",
      rules: [
        {
          id: "encryption-at-rest",
          description: "Storage must be encrypted at rest",
          category: "encryption",
          severity: "critical",
          weight: 40,
          critical: true,
          condition: "resource.encrypted = false",
          message: "Enable server-side encryption on the storage resource.",
        },
        {
          id: "tls-in-transit",
          description: "Clients must connect over TLS 1.2 or newer",
          category: "encryption",
          severity: "high",
          weight: 20,
          condition: { type: "field_lt", field: "resource.minTlsVersion", value: 1.2 },
          message: "Set the minimum TLS version to 1.2.",
        },
        {
          id: "cmk-for-confidential",
          description: "Confidential data requires a customer-managed key",
          category: "data_classification",
          severity: "medium",
          weight: 10,
          condition: 'resource.classification IN ("confidential", "restricted") AND resource.kmsKeyManager != "customer"',
          message: "Use a customer-managed KMS key for confidential or restricted data.",
        },
      ],
    },
  },

  // ── Network ───────────────────────────────────────────────────
  {
    id: "network-segmentation",
    name: "Network Segmentation",
    description: "Keep workloads off the public internet and out of the default network",
    category: "network",
    template: {
      id: "network-segmentation",
      name: "Network Segmentation",
      version: "1",
      description: "Blocks world-open administrative ports and public exposure of private tiers",
      options: { failFast: true },
      rules: [
        {
          id: "no-open-admin-ports",
          description: "SSH and RDP must not be open to 0.0.0.0/0",
          category: "network",
          severity: "critical",
          weight: 50,
          critical: true,
          priority: 10,
          condition: 'resource.ingressCidr = "0.0.0.0/0" AND resource.port IN (22, 3389)',
          message: "Restrict administrative ports to a bastion or VPN range.",
        },
        {
          id: "private-tier-not-public",
          description: "Data and application tiers must not have public addresses",
          category: "network",
          severity: "high",
          weight: 25,
          condition: {
            type: "and",
            conditions: [
              { type: "field_in", field: "resource.tier", values: ["data", "app"] },
              { type: "field_equals", field: "resource.publicIp", value: true },
            ],
          },
          message: "Place data and application tiers in private subnets.",
        },
        {
          id: "no-default-vpc",
          description: "Workloads must not run in the default VPC",
          category: "network",
          severity: "medium",
          weight: 10,
          condition: "resource.vpcId MATCHES \"^default\"",
        },
      ],
    },
  },

  // ── Access control ────────────────────────────────────────────
  {
    id: "access-control-abac",
    name: "Attribute-Based Access Control",
    description: "Grant access only when subject attributes match the resource",
    category: "access-control",
    template: {
      id: "access-control-abac",
      name: "Attribute-Based Access Control",
      version: "1",
      description: "Explicit allow by matching department, with MFA and clearance checks",
      options: { requireExplicitAllow: true, combining: "deny-overrides" },
      rules: [
        {
          id: "same-department",
          description: "Subject and resource belong to the same department",
          category: "access_control",
          severity: "info",
          weight: 0,
          effect: "allow",
          condition: "subject.department = resource.department",
        },
        {
          id: "mfa-required",
          description: "Write actions require MFA",
          category: "access_control",
          severity: "high",
          weight: 25,
          condition: 'action.name IN ("write", "delete") AND subject.mfa = false',
          message: "Re-authenticate with MFA before modifying the resource.",
        },
        {
          id: "clearance-level",
          description: "Subject clearance must meet the resource sensitivity",
          category: "access_control",
          severity: "critical",
          weight: 40,
          critical: true,
          condition: { type: "field_lt", field: "subject.clearance", value: 3 },
          message: "Subject clearance is below the minimum for this resource.",
        },
        {
          id: "outside-business-hours",
          description: "Access outside business hours is flagged",
          category: "access_control",
          severity: "low",
          weight: 5,
          condition: "environment.businessHours = false",
        },
      ],
    },
  },

  // ── Pipeline ──────────────────────────────────────────────────
  {
    id: "pipeline-security-gate",
    name: "Pipeline Security Gate",
    description: "Release gate on scan results, signing and review",
    category: "pipeline",
    template: {
      id: "pipeline-security-gate",
      name: "Pipeline Security Gate",
      version: "1",
      description: "Deployment proceeds only with clean scans, signed artifacts and a reviewed change",
      thresholds: { approval: 85, conditional: 65 },
      rules: [
        {
          id: "no-critical-vulns",
          description: "No critical vulnerabilities in the scan report",
          category: "vulnerability",
          severity: "critical",
          weight: 40,
          critical: true,
          condition: "resource.scan.critical > 0",
          message: "Fix or patch all critical vulnerabilities before release.",
        },
        {
          id: "high-vulns-budget",
          description: "At most two high vulnerabilities",
          category: "vulnerability",
          severity: "high",
          weight: 15,
          condition: "resource.scan.high > 2",
        },
        {
          id: "artifact-signed",
          description: "Build artifact must carry a verified signature",
          category: "integrity",
          severity: "high",
          weight: 20,
          condition: "NOT resource.signature.verified = true",
          message: "Sign the artifact and publish the signature with the build.",
        },
        {
          id: "change-reviewed",
          description: "Change must have at least one approving review",
          category: "integrity",
          severity: "medium",
          weight: 10,
          condition: "resource.reviews.approved < 1",
        },
      ],
    },
  },

  // ── Supply chain ──────────────────────────────────────────────
  {
    id: "package-governance",
    name: "Package Governance",
    description: "Restrict third-party packages by license and registry",
    category: "supply-chain",
    template: {
      id: "package-governance",
      name: "Package Governance",
      version: "1",
      description: "Dependencies come from approved registries under allowed licenses",
      rules: [
        {
          id: "approved-registry",
          description: "Package must come from an approved registry",
          category: "supply_chain",
          severity: "high",
          weight: 25,
          condition: 'resource.registry NOT IN ("internal", "npmjs")',
        },
        {
          id: "copyleft-license",
          description: "Strong copyleft licenses need legal review",
          category: "supply_chain",
          severity: "medium",
          weight: 15,
          condition: 'resource.license IN ("GPL-3.0", "AGPL-3.0")',
          message: "Request a legal review for copyleft dependencies.",
        },
        {
          id: "provenance-attested",
          description: "Package should carry a provenance attestation",
          category: "supply_chain",
          severity: "low",
          weight: 5,
          condition: "resource.provenance NOT EXISTS",
        },
      ],
    },
  },

  // ── Compute ───────────────────────────────────────────────────
  {
    id: "compute-protection",
    name: "Compute Protection",
    description: "Harden instances and containers",
    category: "compute",
    template: {
      id: "compute-protection",
      name: "Compute Protection",
      version: "1",
      description: "Instances must use IMDSv2 and containers must not run privileged",
      rules: [
        {
          id: "imdsv2-required",
          description: "Instance metadata service must require tokens",
          category: "compute",
          severity: "high",
          weight: 20,
          condition: 'resource.type = "instance" AND resource.metadataTokens != "required"',
        },
        {
          id: "no-privileged-containers",
          description: "Containers must not run privileged",
          category: "compute",
          severity: "critical",
          weight: 35,
          critical: true,
          condition: 'resource.type = "container" AND resource.privileged = true',
          message: "Drop the privileged flag and grant only the capabilities the workload needs.",
        },
        {
          id: "logging-enabled",
          description: "Runtime logs must be shipped",
          category: "logging",
          severity: "medium",
          weight: 10,
          condition: "resource.logging = false",
        },
      ],
    },
  },
];

/** Get all available library policies */
export function getLibraryPolicies(): LibraryPolicy[] {
  return POLICY_LIBRARY;
}

/** Get library policies filtered by category */
export function getLibraryByCategory(category: string): LibraryPolicy[] {
  return POLICY_LIBRARY.filter((p) => p.category === category);
}

/** Get a specific library policy by ID */
export function getLibraryPolicy(id: string): LibraryPolicy | undefined {
  return POLICY_LIBRARY.find((p) => p.id === id);
}

/** Get all unique categories */
export function getLibraryCategories(): string[] {
  return [...new Set(POLICY_LIBRARY.map((p) => p.category))];
}
