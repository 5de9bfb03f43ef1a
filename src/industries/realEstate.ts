import { BaseIndustryPolicy, IndustryKey, SearchParams } from './base';
import vocabulary from './vocabulary/real_estate.json';

const REAL_ESTATE_VERTICAL = '["44"]';

export class RealEstatePolicy extends BaseIndustryPolicy {
  readonly key: IndustryKey = 'real_estate';

  constructor() {
    super(vocabulary);
  }

  protected serpApiParams(keyword: string, city: string): SearchParams {
    return {
      ...super.serpApiParams(keyword, city),
      q: `"${keyword}" "${city}" (inmobiliaria OR "real estate" OR properties OR realty)`,
      num: 10,
    };
  }

  protected linkedInParams(keyword: string, city: string): SearchParams {
    return {
      ...super.linkedInParams(keyword, city),
      keywords: `${keyword} real estate ${city}`,
      industryCompanyVertical: REAL_ESTATE_VERTICAL,
    };
  }
}
