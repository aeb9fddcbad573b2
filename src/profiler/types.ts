/**
 * Profile generation types
 */

/**
 * A flag value from configuration; empty strings count as unset
 */
export type FlagValue = string | number;

/**
 * colprof settings
 *
 * Every optional setting that is absent, empty or false is left off the
 * command line.
 */
export interface ProfilerSettings {
  /** Run colprof after writing the TI3 */
  readonly run: boolean;
  /** `-q`: l, m, h or u */
  readonly quality: string;
  /** `-b`: n, l, m, h or u */
  readonly b2a: string;
  /** `-i`, spectral data only */
  readonly illuminant: string;
  /** `-o`, spectral data only */
  readonly observer: string;
  /** OMP_NUM_THREADS for the colprof process */
  readonly threads: number;

  /** `-a` */
  readonly algorithm?: string;
  /** `-V` */
  readonly darkEmphasis?: FlagValue;
  /** `-r` */
  readonly averageDeviation?: FlagValue;
  /** `-f`, spectral data only */
  readonly fwa?: boolean;
  /** Illuminant argument to `-f` */
  readonly fwaIlluminant?: string;
  /** `-s`: percentage, or a source profile/image file */
  readonly gamutMapPerceptual?: string;
  /** `-S`: percentage, or a source profile/image file */
  readonly gamutMapBoth?: string;
  /** `-nP` */
  readonly colorimetricSourceForPerceptual?: boolean;
  /** `-nS` */
  readonly colorimetricSourceForSaturation?: boolean;
  /** `-g` */
  readonly sourceGamutFile?: string;
  /** `-p` */
  readonly abstractProfiles?: string;
  /** `-t` */
  readonly perceptualIntent?: string;
  /** `-T` */
  readonly saturationIntent?: string;
  /** `-c` */
  readonly viewCondIn?: string;
  /** `-d` */
  readonly viewCondOut?: string;
  /** `-P` */
  readonly gamutVrml?: boolean;
  /** `-A` */
  readonly manufacturer?: string;
  /** `-M` */
  readonly model?: string;
  /** `-C` */
  readonly copyright?: string;
  /** `-Z`: subset of t, m, n, b */
  readonly attributes?: string;
  /** `-Z`: p, r, s or a */
  readonly defaultIntent?: string;
  /** `-l` */
  readonly totalInkLimit?: FlagValue;
  /** `-L` */
  readonly blackInkLimit?: FlagValue;
  /** `-k` parameters, split like a shell would */
  readonly blackGeneration?: string;
  /** `-K` parameters, split like a shell would */
  readonly kLocus?: string;
  /** `-ni` */
  readonly noDeviceShaper?: boolean;
  /** `-np` */
  readonly noGridPosition?: boolean;
  /** `-no` */
  readonly noOutputShaper?: boolean;
  /** `-nc` */
  readonly noEmbedTi3?: boolean;
  /** `-u` */
  readonly inputAutoScaleWhitePoint?: boolean;
  /** `-ua` */
  readonly inputForceAbsolute?: boolean;
  /** `-uc` */
  readonly inputClipAboveWhitePoint?: boolean;
  /** `-R` */
  readonly restrictPositive?: boolean;
  /** `-U` */
  readonly whitePointScale?: FlagValue;
}

/**
 * Where the invocation's files live and what the TI3 contains
 */
export interface InvocationContext {
  /** TI3 written by the conversion */
  readonly ti3Path: string;
  /** ICC profile to create */
  readonly iccPath: string;
  /** Profile description (`-D`) */
  readonly description: string;
  /** Whether the TI3 carries spectral columns */
  readonly hasSpectral: boolean;
  /** Resolve a file named in the settings the way input paths are resolved */
  readonly resolveInput: (path: string) => string;
  /** Existence check for file-like flag values */
  readonly fileExists: (path: string) => Promise<boolean>;
  readonly onWarning?: (warning: string) => void;
}

/**
 * A fully built external command
 */
export interface ProfilerInvocation {
  readonly command: string;
  readonly args: readonly string[];
  /** Variables added to the inherited environment */
  readonly env: Readonly<Record<string, string>>;
}

/**
 * Outcome of a successful run
 */
export interface ProfilerResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}
