import { InvalidSignalError } from "../escalation/errors";
import type { SignalScorer } from "../escalation/scoring";
import type { DemandHistory, ForecastData, ForecastTarget } from "./types";

const DEFAULT_DAILY_DEMAND = 100;
const DEFAULT_VOLATILITY = 0.15;
const DEFAULT_SEASONALITY = 1.0;
const DEFAULT_HORIZON_DAYS = 30;

export type ForecastScoringInput = {
  history: DemandHistory;
  target: Required<ForecastTarget>;
  forecastQty: number;
};

export function forecastDemand(
  history: DemandHistory,
  target: ForecastTarget,
  errorScorer: SignalScorer<ForecastScoringInput>
): ForecastData {
  const horizonDays = target.horizonDays ?? DEFAULT_HORIZON_DAYS;
  if (!Number.isInteger(horizonDays) || horizonDays <= 0) {
    throw new InvalidSignalError("Forecast horizon must be a positive whole number of days.", "horizonDays", horizonDays);
  }
  const baseDemand = history.avgDailyDemand ?? DEFAULT_DAILY_DEMAND;
  const volatility = history.volatilityFactor ?? DEFAULT_VOLATILITY;
  const seasonality = history.seasonalityFactor ?? DEFAULT_SEASONALITY;

  const forecastQty = Math.floor(baseDemand * seasonality * horizonDays);
  const lowerBound = Math.floor(forecastQty * (1 - volatility));
  const upperBound = Math.floor(forecastQty * (1 + volatility));

  const historicalErrorRate = errorScorer.score({
    history,
    target: { productId: target.productId, locationId: target.locationId, horizonDays },
    forecastQty
  });
  if (!Number.isFinite(historicalErrorRate) || historicalErrorRate < 0 || historicalErrorRate > 1) {
    throw new InvalidSignalError(
      `Forecast error rate ${historicalErrorRate} must lie in [0, 1].`,
      "forecast.error-rate",
      historicalErrorRate
    );
  }

  return {
    productId: target.productId,
    locationId: target.locationId,
    forecastQty,
    lowerBound,
    upperBound,
    accuracy: 1 - historicalErrorRate,
    historicalErrorRate,
    forecastMethod: "ensemble_hybrid_model",
    horizonDays
  };
}
