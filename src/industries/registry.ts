import { log } from '../utils/logger';
import { IndustryKey, IndustryPolicy } from './base';
import { MedicalAestheticsPolicy } from './medicalAesthetics';
import { RealEstatePolicy } from './realEstate';

export const DEFAULT_INDUSTRY: IndustryKey = 'medical_aesthetics';

const factories: Record<IndustryKey, () => IndustryPolicy> = {
  medical_aesthetics: () => new MedicalAestheticsPolicy(),
  real_estate: () => new RealEstatePolicy(),
};

export const isSupportedIndustry = (key: string): key is IndustryKey =>
  Object.prototype.hasOwnProperty.call(factories, key);

export const listIndustries = (): IndustryKey[] => Object.keys(factories).filter(isSupportedIndustry);

// Unknown keys fall back to the default policy; selecting an industry never throws.
export const resolveIndustry = (key: string = DEFAULT_INDUSTRY): IndustryPolicy => {
  const normalized = key.trim().toLowerCase();
  if (isSupportedIndustry(normalized)) {
    return factories[normalized]();
  }
  log('WARN', `Industry "${key}" not found, falling back to ${DEFAULT_INDUSTRY}`);
  return factories[DEFAULT_INDUSTRY]();
};
