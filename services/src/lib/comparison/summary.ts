import type { ComparisonResult } from "@/types/domain";

const MAX_LISTED_RECOMMENDATIONS = 10;

export function generateRecommendationSummary(result: ComparisonResult): string {
  if (result.status !== "success") {
    return result.message || "No data to compare";
  }

  const lines: string[] = [
    "**SUPPLIER OFFER ANALYSIS**",
    "",
    `Items compared: ${result.itemsCompared}`,
    `Average savings: ${result.averageSavingsPercent}%`,
    "",
    "**RECOMMENDATIONS:**",
    "",
  ];

  result.itemComparisons.slice(0, MAX_LISTED_RECOMMENDATIONS).forEach((comparison, index) => {
    const rec = comparison.recommendation;
    lines.push(
      `${index + 1}. **${comparison.itemName}**`,
      `   Recommended: ${rec.recommendedSupplier}`,
      `   Price: ${rec.recommendedPrice} ${rec.priceUnit}`.trimEnd(),
      `   Savings: ${rec.priceDifferencePercent}%`,
      `   Reason: ${rec.reasoning}`,
      ""
    );
  });

  const remaining = result.itemComparisons.length - MAX_LISTED_RECOMMENDATIONS;
  if (remaining > 0) {
    lines.push(`... and ${remaining} more items`);
  }

  return lines.join("\n").trimEnd();
}
