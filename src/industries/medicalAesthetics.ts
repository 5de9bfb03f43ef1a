import { BaseIndustryPolicy, IndustryKey, SearchParams } from './base';
import vocabulary from './vocabulary/medical_aesthetics.json';

// LinkedIn "Health, Wellness & Fitness" company vertical.
const HEALTH_WELLNESS_VERTICAL = '["147"]';

export class MedicalAestheticsPolicy extends BaseIndustryPolicy {
  readonly key: IndustryKey = 'medical_aesthetics';

  constructor() {
    super(vocabulary);
  }

  protected serpApiParams(keyword: string, city: string): SearchParams {
    return {
      ...super.serpApiParams(keyword, city),
      q: `"${keyword}" "${city}" (clinic OR aesthetic OR beauty OR medical OR supplies OR distributor)`,
      num: 10,
      filter: 1,
    };
  }

  protected linkedInParams(keyword: string, city: string): SearchParams {
    return {
      ...super.linkedInParams(keyword, city),
      keywords: `${keyword} aesthetic medical ${city}`,
      industryCompanyVertical: HEALTH_WELLNESS_VERTICAL,
    };
  }
}
