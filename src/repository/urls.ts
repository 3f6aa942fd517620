export function modelRepoUrl(endpoint: string, modelId: string) {
  return `${endpoint}/${modelId}.git`;
}

export function datasetRepoUrl(endpoint: string, datasetId: string) {
  return `${endpoint}/datasets/${datasetId}.git`;
}
