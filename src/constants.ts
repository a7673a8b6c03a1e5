// src/constants.ts

// --- Physical Constants (SI, CODATA 2018 exact values) ---
export const BOLTZMANN_CONSTANT_K = 1.380649e-23;   // J/K
export const AVOGADRO_CONSTANT_NA = 6.02214076e23;  // 1/mol
export const ELEMENTARY_CHARGE_E = 1.602176634e-19; // C (J per eV)

// --- Unit Scale Factors ---
export const ERG_IN_JOULES = 1e-7;
export const MBAR_CC_IN_JOULES = 1e5;   // 1 Mbar * 1 cm^3 = 1e11 Pa * 1e-6 m^3
export const RYDBERG_IN_ERG = 2.17987e-11;
export const RYDBERG_IN_EV = 13.6056;
export const KILO = 1e3;
export const MILLI = 1e-3;

// --- Derived ---
export const GAS_CONSTANT_R = BOLTZMANN_CONSTANT_K * AVOGADRO_CONSTANT_NA; // J/(mol K), i.e. one kB per atom
export const FARADAY_CONSTANT_F = ELEMENTARY_CHARGE_E * AVOGADRO_CONSTANT_NA; // J/mol, i.e. one eV per atom

// --- Help Text ---
export const USAGE_EXAMPLES = [
    '4 J/g/K kB/atom',
    'Carbon erg/g eV/atom',
    'Zr kB/atom Mbar-cc/g/K',
    'Fe kJ/mol meV/atom 12.5',
] as const;
