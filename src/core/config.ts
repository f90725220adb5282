// src/core/config.ts

/**
 * Optional view-dependent highlight added on top of the Lambert term.
 */
export interface SpecularOptions {
  enabled: boolean;
  /** Blinn-Phong exponent; higher values give tighter highlights. */
  shininess: number;
  /** Scalar multiplier applied to the highlight. */
  strength: number;
}

/**
 * Tunables shared by the shading programs.
 */
export interface ShadingConfig {
  /** Width of the anti-aliased band at a shape's outer edge, in edge-signal units. */
  edgeSmoothing: number;
  /** Upper bound on the border band of a rounded rect, in edge-signal units. */
  maxBorderRatio: number;
  /** Spotlight cutoffs above this value are treated as omni-directional lights. */
  omniCutoffThreshold: number;
  specular: SpecularOptions;
}

export type ShadingConfigOverrides = Partial<Omit<ShadingConfig, "specular">> & {
  specular?: Partial<SpecularOptions>;
};

export const DEFAULT_SHADING_CONFIG: Readonly<ShadingConfig> = Object.freeze({
  edgeSmoothing: 0.1,
  maxBorderRatio: 0.99,
  omniCutoffThreshold: 1.0,
  specular: Object.freeze({
    enabled: false,
    shininess: 32.0,
    strength: 1.0,
  }),
});

function isFiniteNumber(n: unknown): n is number {
  return typeof n === "number" && Number.isFinite(n);
}

/**
 * Merges overrides onto {@link DEFAULT_SHADING_CONFIG} and validates the
 * result.
 *
 * @param overrides - Partial configuration; nested `specular` fields merge
 *   individually.
 * @returns A complete configuration.
 * @throws Error listing every invalid field.
 */
export function resolveShadingConfig(
  overrides?: ShadingConfigOverrides,
): ShadingConfig {
  const config: ShadingConfig = {
    ...DEFAULT_SHADING_CONFIG,
    ...(overrides ?? {}),
    specular: {
      ...DEFAULT_SHADING_CONFIG.specular,
      ...(overrides?.specular ?? {}),
    },
  };

  const errors: string[] = [];
  if (!isFiniteNumber(config.edgeSmoothing) || config.edgeSmoothing <= 0) {
    errors.push("edgeSmoothing: must be a finite number > 0");
  }
  if (
    !isFiniteNumber(config.maxBorderRatio) ||
    config.maxBorderRatio <= 0 ||
    config.maxBorderRatio >= 1
  ) {
    errors.push("maxBorderRatio: must be in (0, 1)");
  }
  if (
    !isFiniteNumber(config.omniCutoffThreshold) ||
    config.omniCutoffThreshold < 1
  ) {
    errors.push("omniCutoffThreshold: must be a finite number >= 1");
  }
  if (typeof config.specular.enabled !== "boolean") {
    errors.push("specular.enabled: must be a boolean");
  }
  if (!isFiniteNumber(config.specular.shininess) || config.specular.shininess < 0) {
    errors.push("specular.shininess: must be a finite number >= 0");
  }
  if (!isFiniteNumber(config.specular.strength) || config.specular.strength < 0) {
    errors.push("specular.strength: must be a finite number >= 0");
  }

  if (errors.length > 0) {
    throw new Error(`Invalid shading config:\n${errors.join("\n")}`);
  }
  return config;
}
