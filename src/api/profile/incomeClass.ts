import { Request } from 'express';
import { Services } from '../../utils/context/services';
import { ValidationError } from '../../utils/errors/errors';
import { classifyIncome, getRegionProfile, IncomeClass } from '../../utils/locale/regions';
import { getQueryString } from '../../utils/net/request';

/**
 * Income class and default behavior for `?income=<monthly>&region=<US-CA>`
 */
export function getIncomeClass(
  request: Request,
  services: Services,
): { region: string; income_class: IncomeClass; default_behavior: string } {
  const incomeText = getQueryString(request, 'income');
  const income = incomeText === undefined ? NaN : Number(incomeText);
  if (isNaN(income)) {
    throw new ValidationError('income query parameter must be a number');
  }
  const region = (getQueryString(request, 'region') ?? services.config.defaultRegion).toUpperCase();
  return {
    region,
    income_class: classifyIncome(income, region, services.config.defaultRegion),
    default_behavior: getRegionProfile(region, services.config.defaultRegion).default_behavior,
  };
}
