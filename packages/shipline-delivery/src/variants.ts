import { ConfigurationError } from '@shipline/core'

/**
 * Per-registry configuration record of the delivery pipeline.
 */
export interface DeliveryVariant {
  /** Stable id used by `--variant`. */
  readonly id: string
  readonly name: string
  /** Registry host prefixed to the image repository. */
  readonly registryHost: string
  /** Severity filters offered by the `TRIVY_SEVERITY` parameter. The first is the default. */
  readonly severityChoices: readonly string[]
  /** Severity filters under which findings do not block the push. */
  readonly toleratedSeverities: readonly string[]
  /** Leaves vulnerabilities without a released fix out of the scan. */
  readonly ignoreUnfixed: boolean
  /** Runs the container smoke test after the push. */
  readonly smokeTest: boolean
}

export const DELIVERY_VARIANTS: readonly DeliveryVariant[] = [
  {
    id: 'dockerhub',
    name: 'Docker Hub',
    registryHost: 'docker.io',
    severityChoices: ['HIGH,CRITICAL', 'CRITICAL', 'LOW,MEDIUM', 'LOW,MEDIUM,HIGH,CRITICAL'],
    toleratedSeverities: ['LOW,MEDIUM'],
    ignoreUnfixed: false,
    smokeTest: true,
  },
  {
    id: 'ghcr',
    name: 'GitHub Container Registry',
    registryHost: 'ghcr.io',
    severityChoices: ['HIGH,CRITICAL', 'CRITICAL'],
    toleratedSeverities: [],
    ignoreUnfixed: true,
    smokeTest: false,
  },
]

/**
 * Looks up a variant by id.
 *
 * @throws ConfigurationError for an unknown id.
 */
export const findDeliveryVariant = (
  variantId: string,
  variants: readonly DeliveryVariant[] = DELIVERY_VARIANTS
): DeliveryVariant => {
  const variant = variants.find((candidate) => candidate.id === variantId)
  if (!variant) {
    throw new ConfigurationError(
      `Unknown variant: ${variantId} (known: ${variants.map((candidate) => candidate.id).join(', ')})`
    )
  }

  return variant
}
