import { Request } from 'express';
import { AnalyticsSummary } from '../../data/analytics/types';
import { Services } from '../../utils/context/services';

export function getAnalyticsSummary(_request: Request, services: Services): AnalyticsSummary {
  return services.analytics.summarize();
}
