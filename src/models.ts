export const AVAILABLE_MODELS = {
  GFS: "gfs_seamless",
  ICON: "icon_seamless",
  ECMWF: "ecmwf_ifs025",
  JMA: "jma_seamless",
  GEM: "gem_seamless",
  UKMO: "ukmo_seamless",
  MeteoFrance: "meteofrance_seamless",
  "ACCESS-G": "bom_access_global",
} as const;

export type ModelId = keyof typeof AVAILABLE_MODELS;

export const MODEL_IDS = Object.keys(AVAILABLE_MODELS).filter(isModelId);

function isModelId(value: string): value is ModelId {
  return Object.hasOwn(AVAILABLE_MODELS, value);
}

/** Case-insensitive lookup returning the canonical spelling. */
export function findModel(name: string): ModelId | undefined {
  const lowered = name.toLowerCase();
  return MODEL_IDS.find((id) => id.toLowerCase() === lowered);
}

export function providerKey(model: ModelId): string {
  return AVAILABLE_MODELS[model];
}
