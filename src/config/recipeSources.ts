export type RecipeSource = {
  key: string;
  name: string;
  apiURL: string;
  rateLimitPerHour: number;
  requiresKey: boolean;
  enabled: boolean;
};

const DEFAULT_RECIPE_SOURCES: readonly RecipeSource[] = [
  {
    key: "spoonacular",
    name: "Spoonacular",
    apiURL: "https://api.spoonacular.com/recipes",
    rateLimitPerHour: 150,
    requiresKey: true,
    enabled: false
  },
  {
    key: "edamam",
    name: "Edamam",
    apiURL: "https://api.edamam.com/api/recipes/v2",
    rateLimitPerHour: 10,
    requiresKey: true,
    enabled: false
  },
  {
    key: "mock_dynamic",
    name: "Dynamic Recipe Generation",
    apiURL: "mock://dynamic",
    rateLimitPerHour: 1000,
    requiresKey: false,
    enabled: true
  }
];

export const SYNTHETIC_SOURCE_KEY = "mock_dynamic";

export function recipeSourcesFromEnv(dynamicEnabled: boolean): RecipeSource[] {
  return DEFAULT_RECIPE_SOURCES.map((source) =>
    source.key === SYNTHETIC_SOURCE_KEY ? { ...source, enabled: dynamicEnabled } : { ...source }
  );
}

export const defaultRecipeSources = DEFAULT_RECIPE_SOURCES.map((source) => ({ ...source }));
