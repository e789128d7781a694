import { benefitTagsFor } from "../config/healthBenefits.js";
import { defaultRecipeSources } from "../config/recipeSources.js";
import type {
  CompatibilityResult,
  DietaryGuidelines,
  FiltersApplied,
  GoalCheck,
  NutritionAnalysis,
  NutritionAnalysisRow,
  Recipe,
  RecipeData,
  RecommendResponse,
  SearchRequest,
  SearchResponse,
  SearchResult,
  SubstituteResponse,
  UserProfile
} from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { clamp, mean, uniqueStrings } from "../utils/normalize.js";
import { CandidateProvider, type CandidateSourceStats } from "./candidateGenerator.js";
import { COMPATIBLE_THRESHOLD, CompatibilityAnalyzer } from "./compatibilityAnalyzer.js";
import { computeCorpusStats, type CorpusStats } from "./corpusStats.js";
import { isIn, notContains, type MetadataFilter } from "./filterPredicate.js";
import type { IngredientMatcher } from "./ingredientMatcher.js";
import { SubstitutionEngine, numericGoals } from "./ingredientSubstitutions.js";
import { recipeDocuments, recipeMetadata, titleFromText } from "./recipeDocuments.js";
import { TextEmbedder, type EmbedderInfo } from "./textEmbedder.js";
import { VectorIndex, type IndexHits, type VectorIndexStats } from "./vectorIndex.js";

const log = createChildLogger({ component: "recommender" });

const SEARCH_WEIGHT = 0.6;
const COMPATIBILITY_WEIGHT = 0.4;
const DYNAMIC_SEARCH_SCORE = 0.8;
const DYNAMIC_DISTANCE = 0.2;
const DYNAMIC_DISCOUNT = 0.8;
const DEFAULT_RESULTS = 5;
const TOP_ANALYSIS_ROWS = 5;
const DEFAULT_QUERY = "healthy recipe";

const GOAL_FLAG_TERMS: ReadonlyArray<[flag: string, term: string]> = [
  ["high_protein", "high protein"],
  ["low_carb", "low carb"],
  ["low_fat", "low fat"],
  ["high_fiber", "high fiber"]
];

export type RecommenderOptions = {
  embeddingDimension?: number;
  chunkSize?: number;
  matcher?: IngredientMatcher;
  candidateProvider?: CandidateProvider;
  // used when a request carries no seed of its own
  defaultSeed?: number;
};

export type RecommendOptions = {
  nRecommendations?: number;
  includeDynamic?: boolean;
  seed?: number;
};

export type RecommenderStats = CorpusStats & {
  embedder: EmbedderInfo;
  index: VectorIndexStats;
  sources: CandidateSourceStats;
};

/**
 * Retrieval and ranking pipeline over a loaded recipe corpus. The vocabulary
 * is fitted and the index filled once, in the constructor; afterwards every
 * operation only reads that state.
 */
export class RecipeRecommender {
  readonly embedder: TextEmbedder;
  readonly index: VectorIndex;
  readonly analyzer: CompatibilityAnalyzer;
  readonly substitutions: SubstitutionEngine;
  private readonly candidates: CandidateProvider;
  private readonly recipesByTitle = new Map<string, Recipe>();
  private readonly recipesById = new Map<string, Recipe>();
  private readonly defaultSeed: number | undefined;

  constructor(
    private readonly data: RecipeData,
    options: RecommenderOptions = {}
  ) {
    this.embedder = new TextEmbedder(options.embeddingDimension);
    this.index = new VectorIndex("recipes");
    this.analyzer = new CompatibilityAnalyzer(data.guidelines, options.matcher);
    this.substitutions = new SubstitutionEngine(data.guidelines, data.nutrients);
    this.defaultSeed = options.defaultSeed;
    this.candidates =
      options.candidateProvider ??
      new CandidateProvider(defaultRecipeSources, { allergyTriggers: allergyTriggersFrom(data.guidelines) });

    for (const recipe of data.recipes) {
      if (!this.recipesByTitle.has(recipe.title)) this.recipesByTitle.set(recipe.title, recipe);
      if (!this.recipesById.has(recipe.id)) this.recipesById.set(recipe.id, recipe);
    }

    const documents = recipeDocuments(data.recipes, options.chunkSize);
    const embeddings = this.embedder.fitAndEncode(documents.map((document) => document.text));
    this.index.add(
      documents.map((document) => document.text),
      documents.map((document) => document.metadata),
      embeddings
    );

    log.info({
      msg: "Recipe index built",
      recipes: data.recipes.length,
      documents: documents.length,
      vocabSize: this.embedder.info().vocabSize
    });
  }

  get recipes(): readonly Recipe[] {
    return this.data.recipes;
  }

  recipeById(id: string): Recipe | null {
    return this.recipesById.get(id) ?? null;
  }

  search(request: SearchRequest): SearchResponse {
    const restrictions = request.dietaryRestrictions ?? [];
    const allergies = request.allergies ?? [];
    const healthConditions = request.healthConditions ?? [];
    const nResults = request.nResults ?? DEFAULT_RESULTS;
    const includeDynamic = request.includeDynamic ?? true;

    const filter = this.buildFilter(restrictions, allergies, healthConditions);
    const hits = this.index.search(this.embedder.encodeQuery(request.query), nResults * 2, filter);
    const results = this.staticResults(hits, restrictions, allergies, healthConditions);

    if (includeDynamic) {
      const generated = this.candidates.candidates({
        query: request.query,
        dietaryRestrictions: restrictions,
        allergies,
        healthConditions,
        count: nResults,
        seed: request.seed ?? this.defaultSeed
      });
      for (const recipe of generated) {
        const compatibility = this.analyzer.analyze(recipe, restrictions, allergies, healthConditions);
        results.push({
          recipe,
          compatibility,
          searchScore: DYNAMIC_SEARCH_SCORE,
          overallScore: compatibility.overallScore * DYNAMIC_DISCOUNT,
          distance: DYNAMIC_DISTANCE,
          metadata: recipeMetadata(recipe)
        });
      }
    }

    // Array.prototype.sort is stable, so equal scores keep index order ahead of generated ones.
    results.sort((left, right) => right.overallScore - left.overallScore);
    const unique = dedupeByTitle(results);

    log.debug({
      msg: "Search completed",
      query: request.query,
      staticHits: hits.ids.length,
      totalFound: unique.length
    });

    return {
      results: unique.slice(0, Math.max(0, nResults)),
      totalFound: unique.length,
      query: request.query,
      filtersApplied: { dietaryRestrictions: restrictions, allergies, healthConditions },
      dynamicRecipesIncluded: includeDynamic
    };
  }

  recommend(profile: UserProfile, options: RecommendOptions = {}): RecommendResponse {
    const nRecommendations = options.nRecommendations ?? DEFAULT_RESULTS;
    const includeDynamic = options.includeDynamic ?? true;
    const searchQuery = buildProfileQuery(profile);

    const { results } = this.search({
      query: searchQuery,
      dietaryRestrictions: profile.dietaryRestrictions,
      allergies: profile.allergies,
      healthConditions: profile.healthConditions,
      nResults: nRecommendations * 2,
      includeDynamic,
      seed: options.seed
    });

    const hasTargets = Object.keys(numericGoals(profile.nutritionalGoals)).length > 0;
    const recommendations = results.slice(0, Math.max(0, nRecommendations)).map((result) =>
      hasTargets
        ? {
            ...result,
            nutritionOptimization: this.substitutions.optimizeNutrition(
              result.recipe,
              profile.nutritionalGoals,
              profile.dietaryRestrictions,
              profile.allergies
            )
          }
        : result
    );

    return { recommendations, userProfile: profile, searchQuery, dynamicRecipesIncluded: includeDynamic };
  }

  substitute(ingredient: string, restrictions: string[] = [], allergies: string[] = []): SubstituteResponse {
    const substitutions = this.substitutions.findSubstitutions(ingredient, restrictions, allergies);
    const filtersApplied: FiltersApplied = { dietaryRestrictions: restrictions, allergies };
    return {
      originalIngredient: ingredient,
      substitutions,
      totalOptions: substitutions.length,
      filtersApplied
    };
  }

  analyzeCompatibility(
    recipe: Recipe,
    restrictions: string[] = [],
    allergies: string[] = [],
    healthConditions: string[] = []
  ): CompatibilityResult {
    return this.analyzer.analyze(recipe, restrictions, allergies, healthConditions);
  }

  nutritionAnalysis(profile: UserProfile): NutritionAnalysis {
    const scored = this.data.recipes.map((recipe) => ({
      recipe,
      compatibility: this.analyzer.analyze(
        recipe,
        profile.dietaryRestrictions,
        profile.allergies,
        profile.healthConditions
      )
    }));
    const compatible = scored.filter((item) => item.compatibility.overallScore >= COMPATIBLE_THRESHOLD);

    const average = (pick: (recipe: Recipe) => number | undefined): number =>
      mean(compatible.map((item) => pick(item.recipe) ?? 0), 0);

    const averages = {
      calories: average((recipe) => recipe.nutrition.calories),
      protein: average((recipe) => recipe.nutrition.protein),
      carbohydrates: average((recipe) => recipe.nutrition.carbohydrates),
      fat: average((recipe) => recipe.nutrition.fat),
      fiber: average((recipe) => recipe.nutrition.fiber),
      sodium: average((recipe) => recipe.nutrition.sodium)
    };

    const goals = numericGoals(profile.nutritionalGoals);
    const goalChecks: GoalCheck[] = [];
    if (goals.calories !== undefined) {
      goalChecks.push({
        nutrient: "calories",
        goal: goals.calories,
        average: averages.calories,
        met: averages.calories <= goals.calories
      });
    }
    if (goals.protein !== undefined) {
      goalChecks.push({
        nutrient: "protein",
        goal: goals.protein,
        average: averages.protein,
        met: averages.protein >= goals.protein
      });
    }
    if (goals.fiber !== undefined) {
      goalChecks.push({
        nutrient: "fiber",
        goal: goals.fiber,
        average: averages.fiber,
        met: averages.fiber >= goals.fiber
      });
    }

    const topRecipes: NutritionAnalysisRow[] = [...compatible]
      .sort((left, right) => right.compatibility.overallScore - left.compatibility.overallScore)
      .slice(0, TOP_ANALYSIS_ROWS)
      .map(({ recipe, compatibility }) => ({
        title: recipe.title,
        cuisineType: recipe.cuisineType,
        compatibilityScore: compatibility.overallScore,
        nutrition: recipe.nutrition
      }));

    return {
      compatibleCount: compatible.length,
      incompatibleCount: scored.length - compatible.length,
      compatibilityRate: scored.length > 0 ? compatible.length / scored.length : 0,
      averages,
      goalChecks,
      topRecipes
    };
  }

  stats(): RecommenderStats {
    return {
      ...computeCorpusStats(this.data.recipes, this.data.guidelines),
      embedder: this.embedder.info(),
      index: this.index.stats(),
      sources: this.candidates.sourceStats()
    };
  }

  private buildFilter(restrictions: string[], allergies: string[], healthConditions: string[]): MetadataFilter | undefined {
    const filter: MetadataFilter = {};
    if (restrictions.length > 0) {
      filter.dietary_tags = isIn(restrictions);
    }

    const triggers = uniqueStrings(
      allergies.flatMap((allergy) => this.data.guidelines.allergies[allergy]?.incompatibleIngredients ?? [])
    ).map((trigger) => trigger.toLowerCase());
    if (triggers.length > 0) {
      filter.ingredients = notContains(triggers);
    }

    const benefits = benefitTagsFor(healthConditions);
    if (benefits.length > 0) {
      filter.health_benefits = isIn(benefits);
    }

    return Object.keys(filter).length > 0 ? filter : undefined;
  }

  private staticResults(
    hits: IndexHits,
    restrictions: string[],
    allergies: string[],
    healthConditions: string[]
  ): SearchResult[] {
    const maxDistance = hits.distances.length > 0 ? Math.max(...hits.distances) : 0;
    const results: SearchResult[] = [];

    hits.documents.forEach((document, position) => {
      const title = titleFromText(document);
      const recipe = title === null ? undefined : this.recipesByTitle.get(title);
      if (!recipe) return;

      const distance = hits.distances[position] ?? 0;
      const searchScore = maxDistance > 0 ? clamp(1 - distance / maxDistance, 0, 1) : 1;
      const compatibility = this.analyzer.analyze(recipe, restrictions, allergies, healthConditions);

      results.push({
        recipe,
        compatibility,
        searchScore,
        overallScore: SEARCH_WEIGHT * searchScore + COMPATIBILITY_WEIGHT * compatibility.overallScore,
        distance,
        metadata: hits.metadatas[position] ?? recipeMetadata(recipe)
      });
    });

    return results;
  }
}

export function allergyTriggersFrom(guidelines: DietaryGuidelines): Record<string, string[]> {
  const triggers: Record<string, string[]> = {};
  for (const [allergy, info] of Object.entries(guidelines.allergies)) {
    triggers[allergy] = info.incompatibleIngredients;
  }
  return triggers;
}

export function buildProfileQuery(profile: Pick<UserProfile, "preferences" | "nutritionalGoals">): string {
  const parts = [...profile.preferences];
  for (const [flag, term] of GOAL_FLAG_TERMS) {
    if (profile.nutritionalGoals[flag] === true) parts.push(term);
  }
  const query = parts.join(" ").trim();
  return query.length > 0 ? query : DEFAULT_QUERY;
}

export function dedupeByTitle(results: SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  return results.filter((result) => {
    if (seen.has(result.recipe.title)) return false;
    seen.add(result.recipe.title);
    return true;
  });
}
