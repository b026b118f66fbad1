import { InMemoryAssetGraph } from "../assetGraph";
import { InMemoryTwinGraph } from "../twinGraph";

/** In-memory stand-ins for both graph stores, with the root asset in place. */
export async function createDevGraphs(rootExternalId: string) {
  const assetGraph = new InMemoryAssetGraph();
  const twinGraph = new InMemoryTwinGraph();

  await assetGraph.createAsset({ externalId: rootExternalId, name: rootExternalId, metadata: {} });

  return { assetGraph, twinGraph };
}
