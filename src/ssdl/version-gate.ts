import type { Diagnostic } from '../kernel/diagnostics.js';
import type { SemanticVersion, VersionCompatibility } from '../kernel/types.js';
import type { Located } from './descriptor-doc.js';
import { SSDL_DIAGNOSTIC_CODES } from './diagnostic-codes.js';
import { createDiagnostic } from './validate-shared.js';

export interface VersionGateResult {
  /** `null` when the major version is not supported. */
  readonly compatibility: VersionCompatibility | null;
  readonly diagnostics: readonly Diagnostic[];
}

export function formatVersion(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function compareVersions(left: SemanticVersion, right: SemanticVersion): number {
  if (left.major !== right.major) {
    return left.major - right.major;
  }
  if (left.minor !== right.minor) {
    return left.minor - right.minor;
  }
  return left.patch - right.patch;
}

/**
 * Checks a descriptor version against the reference version configured for
 * its major. Unknown majors fail closed.
 */
export function checkDescriptorVersion(
  version: Located<SemanticVersion>,
  supportedVersions: readonly SemanticVersion[],
): VersionGateResult {
  const reference = supportedVersions.find((candidate) => candidate.major === version.value.major);
  const declared = formatVersion(version.value);

  if (reference === undefined) {
    const supportedMajors = supportedVersions.map((candidate) => String(candidate.major));
    return {
      compatibility: null,
      diagnostics: [
        createDiagnostic(
          'UnsupportedVersionError',
          SSDL_DIAGNOSTIC_CODES.SSDL_VERSION_MAJOR_UNSUPPORTED,
          version.path,
          `Descriptor version ${declared} has unsupported major version ${version.value.major}.`,
          {
            expected: `major version ${supportedMajors.join(' or ')}`,
            actual: String(version.value.major),
            suggestion: `Migrate the descriptor to ${supportedVersions.map(formatVersion).join(' or ')}.`,
            alternatives: supportedVersions.map(formatVersion),
          },
        ),
      ],
    };
  }

  const order = compareVersions(version.value, reference);
  if (order === 0) {
    return { compatibility: 'exact', diagnostics: [] };
  }

  const ahead = order > 0;
  return {
    compatibility: ahead ? 'ahead' : 'behind',
    diagnostics: [
      createDiagnostic(
        'VersionWarning',
        ahead ? SSDL_DIAGNOSTIC_CODES.SSDL_VERSION_AHEAD : SSDL_DIAGNOSTIC_CODES.SSDL_VERSION_BEHIND,
        version.path,
        ahead
          ? `Descriptor version ${declared} is newer than the compiler's ${formatVersion(reference)}; newer features may be ignored.`
          : `Descriptor version ${declared} is older than the compiler's ${formatVersion(reference)}.`,
        { expected: formatVersion(reference), actual: declared },
      ),
    ],
  };
}
