// Secret pattern catalog.
// Each pattern is matched line by line; severity feeds the audit risk verdict.

import type { Severity } from "../model/severity.js";

export type SecretType =
  | "aws_access_key"
  | "aws_secret_key"
  | "gcp_service_account"
  | "private_key"
  | "github_token"
  | "database_url"
  | "generic_password"
  | "generic_api_key"
  | "jwt_token";

export type SecretConfidence = "low" | "medium" | "high";

export type SecretPattern = {
  name: string;
  secret_type: SecretType;
  severity: Severity;
  confidence: SecretConfidence;
  regex: RegExp;
};

export const SECRET_PATTERNS: readonly SecretPattern[] = [
  {
    name: "AWS Access Key ID",
    secret_type: "aws_access_key",
    severity: "critical",
    confidence: "high",
    regex: /(A3T[A-Z0-9]|AKIA|AGPA|AIDA|AROA|AIPA|ANPA|ANVA|ASIA)[A-Z0-9]{16}/i,
  },
  {
    name: "AWS Secret Access Key",
    secret_type: "aws_secret_key",
    severity: "critical",
    confidence: "high",
    regex: /aws[_-]?secret[_-]?access[_-]?key['"]?\s*[:=]\s*['"]?([A-Za-z0-9/+=]{40})['"]?/i,
  },
  {
    name: "GCP Service Account Key",
    secret_type: "gcp_service_account",
    severity: "critical",
    confidence: "high",
    regex: /"type"\s*:\s*"service_account"/,
  },
  {
    name: "RSA/EC Private Key",
    secret_type: "private_key",
    severity: "critical",
    confidence: "high",
    regex: /-----BEGIN (RSA |EC |OPENSSH )?PRIVATE KEY-----/,
  },
  {
    name: "GitHub Token",
    secret_type: "github_token",
    severity: "critical",
    confidence: "high",
    regex: /gh[pousr]_[A-Za-z0-9_]{36,255}/,
  },
  {
    name: "Database Connection String",
    secret_type: "database_url",
    severity: "critical",
    confidence: "medium",
    regex: /(postgres|mysql|mongodb|redis):\/\/[^:\s]+:[^@\s]+@/i,
  },
  {
    name: "Generic Password",
    secret_type: "generic_password",
    severity: "critical",
    confidence: "medium",
    regex: /(password|passwd|pwd)['"]?\s*[:=]\s*['"]?([^'">\s]{8,})['"]?/i,
  },
  {
    name: "Generic API Key",
    secret_type: "generic_api_key",
    severity: "high",
    confidence: "medium",
    regex: /(api[_-]?key|apikey|api[_-]?secret)['"]?\s*[:=]\s*['"]?([A-Za-z0-9_-]{20,})['"]?/i,
  },
  {
    name: "JWT Token",
    secret_type: "jwt_token",
    severity: "high",
    confidence: "low",
    regex: /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/,
  },
];

// Lines containing any of these are treated as placeholders or templates.
export const PLACEHOLDER_MARKERS = [
  "example.com",
  "localhost",
  "127.0.0.1",
  "REPLACE_ME",
  "YOUR_KEY_HERE",
  "XXX",
  "${",
  "{{",
  "%",
];
