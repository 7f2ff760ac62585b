/**
 * @fileoverview Approximate multilib categories
 *
 * scanelf does not report a multilib category, but the soname relations are
 * keyed by one. This is the same architecture → category approximation the
 * package manager's ELF linkage map falls back on. It ignores the ELF class
 * and ABI flags, so it is a best guess, not detection.
 */

export const ELF_ARCHITECTURES = [
  '386',
  '68K',
  'AARCH64',
  'ALPHA',
  'ARM',
  'IA_64',
  'MIPS',
  'PARISC',
  'PPC',
  'PPC64',
  'S390',
  'SH',
  'SPARC',
  'SPARC32PLUS',
  'SPARCV9',
  'X86_64',
] as const;

export type ElfArchitecture = (typeof ELF_ARCHITECTURES)[number];

export const APPROX_MULTILIB_CATEGORIES: Readonly<Record<ElfArchitecture, string>> = Object.freeze({
  '386': 'x86_32',
  '68K': 'm68k_32',
  AARCH64: 'arm_64',
  ALPHA: 'alpha_64',
  ARM: 'arm_32',
  IA_64: 'ia64_64',
  MIPS: 'mips_o32',
  PARISC: 'hppa_64',
  PPC: 'ppc_32',
  PPC64: 'ppc_64',
  S390: 's390_64',
  SH: 'sh_32',
  SPARC: 'sparc_32',
  SPARC32PLUS: 'sparc_32',
  SPARCV9: 'sparc_64',
  X86_64: 'x86_64',
});

export function isKnownArchitecture(arch: string): arch is ElfArchitecture {
  return Object.hasOwn(APPROX_MULTILIB_CATEGORIES, arch);
}

/**
 * Unknown architectures pass through as their own category.
 */
export function approximateMultilibCategory(arch: string): string {
  return isKnownArchitecture(arch) ? APPROX_MULTILIB_CATEGORIES[arch] : arch;
}
