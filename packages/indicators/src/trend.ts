import type {
	IndicatorSnapshot,
	PricePosition,
	RsiZone,
	TradeSignal,
	Trend,
	TrendClassification,
	TrendThresholds,
	VolatilityLevel,
} from "./types";

export const DEFAULT_THRESHOLDS: TrendThresholds = {
	highVolatility: 0.3,
	moderateVolatility: 0.2,
	rsiOverbought: 70,
	rsiOversold: 30,
};

type Direction = "up" | "down" | "flat";

const compare = (left: number | null, right: number | null): Direction | null => {
	if (left === null || right === null) {
		return null;
	}
	if (left > right) {
		return "up";
	}
	return left < right ? "down" : "flat";
};

/**
 * Rule table:
 *   smaShort > smaLong and MACD > signal  -> Bullish / BUY
 *   smaShort < smaLong and MACD < signal  -> Bearish / SELL
 *   anything else (ties, missing values)  -> Neutral / HOLD
 */
export const classifyDirection = (
	snapshot: IndicatorSnapshot
): { trend: Trend; signal: TradeSignal } => {
	const averages = compare(snapshot.smaShort, snapshot.smaLong);
	const momentum = compare(snapshot.macd, snapshot.macdSignal);
	if (averages === "up" && momentum === "up") {
		return { trend: "Bullish", signal: "BUY" };
	}
	if (averages === "down" && momentum === "down") {
		return { trend: "Bearish", signal: "SELL" };
	}
	return { trend: "Neutral", signal: "HOLD" };
};

export const classifyVolatility = (
	annualized: number | null,
	thresholds: TrendThresholds
): VolatilityLevel | null => {
	if (annualized === null) {
		return null;
	}
	if (annualized > thresholds.highVolatility) {
		return "high";
	}
	return annualized > thresholds.moderateVolatility ? "moderate" : "low";
};

export const classifyRsi = (
	rsi: number | null,
	thresholds: TrendThresholds
): RsiZone | null => {
	if (rsi === null) {
		return null;
	}
	if (rsi > thresholds.rsiOverbought) {
		return "overbought";
	}
	return rsi < thresholds.rsiOversold ? "oversold" : "neutral";
};

export const classifyPricePosition = (
	snapshot: IndicatorSnapshot
): PricePosition | null => {
	const { close, smaShort, smaLong } = snapshot;
	if (close === null || smaShort === null || smaLong === null) {
		return null;
	}
	if (close > smaShort && close > smaLong) {
		return "above_both";
	}
	if (close < smaShort && close < smaLong) {
		return "below_both";
	}
	return "between";
};

const TREND_TEXT: Record<Trend, string> = {
	Bullish: "short moving average above long and MACD above signal",
	Bearish: "short moving average below long and MACD below signal",
	Neutral: "moving-average and MACD readings disagree",
};

const POSITION_TEXT: Record<PricePosition, string> = {
	above_both: "price above both moving averages",
	between: "price between the moving averages",
	below_both: "price below both moving averages",
};

const buildSummary = (
	trend: Trend,
	position: PricePosition | null,
	volatility: VolatilityLevel | null,
	annualized: number | null
): string => {
	const parts = [`${trend}: ${TREND_TEXT[trend]}`];
	if (position !== null) {
		parts.push(POSITION_TEXT[position]);
	}
	if (volatility !== null && annualized !== null) {
		parts.push(
			`${volatility} volatility (${(annualized * 100).toFixed(1)}% annualised)`
		);
	}
	return `${parts.join("; ")}.`;
};

export function classifyTrend(
	snapshot: IndicatorSnapshot,
	thresholds: TrendThresholds = DEFAULT_THRESHOLDS
): TrendClassification {
	const { trend, signal } = classifyDirection(snapshot);
	const volatilityLevel = classifyVolatility(
		snapshot.annualizedVolatility,
		thresholds
	);
	const pricePosition = classifyPricePosition(snapshot);
	return {
		trend,
		signal,
		volatilityLevel,
		rsiZone: classifyRsi(snapshot.rsi, thresholds),
		pricePosition,
		summary: buildSummary(
			trend,
			pricePosition,
			volatilityLevel,
			snapshot.annualizedVolatility
		),
	};
}
