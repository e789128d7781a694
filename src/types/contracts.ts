export type NutrientName =
  | "calories"
  | "protein"
  | "carbohydrates"
  | "fat"
  | "fiber"
  | "sodium"
  | "sugar";

export type Nutrition = Partial<Record<NutrientName, number>>;

export type RecipeDifficulty = "easy" | "medium" | "hard";

export type RecipeSourceTag = "static" | "dynamic_generation";

export type RecipeIngredient = {
  name: string;
  amount?: number | string;
  unit?: string;
  notes?: string;
};

export type Recipe = {
  id: string;
  title: string;
  description: string;
  cuisineType: string;
  dietaryTags: string[];
  healthBenefits: string[];
  ingredients: RecipeIngredient[];
  instructions: string[];
  nutrition: Nutrition;
  prepTime?: number;
  cookTime?: number;
  servings?: number;
  difficulty?: RecipeDifficulty;
  source: RecipeSourceTag;
};

export type NutritionalGoals = Record<string, number | boolean>;

export type UserProfile = {
  dietaryRestrictions: string[];
  allergies: string[];
  healthConditions: string[];
  preferences: string[];
  nutritionalGoals: NutritionalGoals;
};

// Guideline tables

export type DietaryRestrictionInfo = {
  description?: string;
  excludedIngredients: string[];
};

export type AllergyInfo = {
  description?: string;
  incompatibleIngredients: string[];
};

export type HealthConditionInfo = {
  description?: string;
  recommendedBenefits: string[];
  avoidNutrients: string[];
  recommendedNutrients: string[];
};

export type SubstituteInfo = {
  name: string;
  ratio?: string;
  notes?: string;
};

export type DietaryGuidelines = {
  dietaryRestrictions: Record<string, DietaryRestrictionInfo>;
  allergies: Record<string, AllergyInfo>;
  healthConditions: Record<string, HealthConditionInfo>;
  ingredientSubstitutions: Record<string, { substitutes: SubstituteInfo[] }>;
};

export type IngredientNutrientRecord = {
  dietaryTags: string[];
  nutrition: Nutrition;
};

export type NutrientDatabase = Record<string, IngredientNutrientRecord>;

export type RecipeData = {
  recipes: Recipe[];
  nutrients: NutrientDatabase;
  guidelines: DietaryGuidelines;
};

// Compatibility

export type RestrictionCheck = {
  compatible: boolean;
  score: number;
  hasRestrictionTag: boolean;
  conflictingIngredients: string[];
  excludedIngredients: string[];
};

export type AllergyCheck = {
  compatible: boolean;
  score: number;
  conflictingIngredients: string[];
  incompatibleIngredients: string[];
};

export type HealthCheck = {
  compatible: boolean;
  score: number;
  hasRecommendedBenefits: boolean;
  nutritionalScore: number;
  recommendedBenefits: string[];
  avoidNutrients: string[];
  recommendedNutrients: string[];
};

export type DimensionResult<T> = {
  compatible: boolean;
  score: number;
  results: Record<string, T>;
};

export type CompatibilityResult = {
  overallCompatible: boolean;
  overallScore: number;
  restriction: DimensionResult<RestrictionCheck>;
  allergy: DimensionResult<AllergyCheck>;
  health: DimensionResult<HealthCheck>;
  issues: string[];
  suggestions: string[];
};

// Substitution and optimization

export type SubstitutionOption = {
  originalIngredient: string;
  substituteName: string;
  ratio: string;
  notes: string;
  compatibilityScore: number;
  nutritionalSimilarity: number;
  overallScore: number;
};

export type NutrientBoostSuggestion = {
  type: "add_ingredient";
  ingredient: string;
  nutrient: string;
  nutrientValue: number;
  compatibilityScore: number;
  suggestion: string;
};

export type NutrientReductionSuggestion = {
  type: "substitute_ingredient";
  originalIngredient: string;
  substituteIngredient: string;
  nutrient: string;
  reduction: number;
  compatibilityScore: number;
  suggestion: string;
};

export type OptimizationSuggestion = NutrientBoostSuggestion | NutrientReductionSuggestion;

export type NutrientAnalysis = {
  current: number;
  target: number;
  difference: number;
  suggestionsCount: number;
};

export type NutritionOptimization = {
  optimizationScore: number;
  suggestions: OptimizationSuggestion[];
  nutrientAnalysis: Record<string, NutrientAnalysis>;
  currentNutrition: Nutrition;
  targetNutrition: Record<string, number>;
};

// Retrieval

export type MetadataValue = string | number | boolean | string[] | null;

export type RecipeMetadata = Record<string, MetadataValue>;

export type SearchResult = {
  recipe: Recipe;
  compatibility: CompatibilityResult;
  searchScore: number;
  overallScore: number;
  distance: number;
  metadata: RecipeMetadata;
  nutritionOptimization?: NutritionOptimization;
};

export type FiltersApplied = {
  dietaryRestrictions: string[];
  allergies: string[];
  healthConditions?: string[];
};

export type SearchRequest = {
  query: string;
  dietaryRestrictions?: string[];
  allergies?: string[];
  healthConditions?: string[];
  nResults?: number;
  includeDynamic?: boolean;
  seed?: number;
};

export type SearchResponse = {
  results: SearchResult[];
  totalFound: number;
  query: string;
  filtersApplied: FiltersApplied;
  dynamicRecipesIncluded: boolean;
};

export type RecommendResponse = {
  recommendations: SearchResult[];
  userProfile: UserProfile;
  searchQuery: string;
  dynamicRecipesIncluded: boolean;
};

export type SubstituteResponse = {
  originalIngredient: string;
  substitutions: SubstitutionOption[];
  totalOptions: number;
  filtersApplied: FiltersApplied;
};

export type NutritionAnalysisRow = {
  title: string;
  cuisineType: string;
  compatibilityScore: number;
  nutrition: Nutrition;
};

export type GoalCheck = {
  nutrient: NutrientName;
  goal: number;
  average: number;
  met: boolean;
};

export type NutritionAnalysis = {
  compatibleCount: number;
  incompatibleCount: number;
  compatibilityRate: number;
  averages: Record<"calories" | "protein" | "carbohydrates" | "fat" | "fiber" | "sodium", number>;
  goalChecks: GoalCheck[];
  topRecipes: NutritionAnalysisRow[];
};
