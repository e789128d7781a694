// Health-benefit tags that indicate a recipe suits a condition.
export const CONDITION_BENEFIT_TAGS: Readonly<Record<string, readonly string[]>> = {
  diabetes: ["diabetes_friendly", "blood_sugar_control"],
  heart_disease: ["heart_healthy", "cholesterol_lowering"],
  hypertension: ["blood_pressure_control", "heart_healthy"],
  celiac_disease: ["celiac_safe", "gluten_free"],
  lactose_intolerance: ["lactose_intolerance_safe", "dairy_free"],
  obesity: ["weight_management", "low_carb"]
};

export function benefitTagsFor(conditions: string[]): string[] {
  const tags: string[] = [];
  for (const condition of conditions) {
    for (const tag of CONDITION_BENEFIT_TAGS[condition] ?? []) {
      if (!tags.includes(tag)) tags.push(tag);
    }
  }
  return tags;
}
