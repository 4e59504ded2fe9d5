/**
 * Registry Client Example: Inspect Image
 *
 * Resolves an image reference, fetches its manifest and prints what it points at.
 *
 * Usage:
 *   REGISTRY_URL=http://localhost:5000 npx ts-node examples/inspect-image.ts alpine:3.19
 */

import {
  RegistryClient,
  isImageManifest,
  isManifestIndex,
  loadClientOptions,
  manifestKind,
  parseImageReference,
  registryBaseURL,
  totalLayerSize,
} from '../src';

async function main() {
  const image = parseImageReference(process.argv[2] || 'alpine:latest');
  const options = process.env.REGISTRY_URL
    ? loadClientOptions()
    : { baseURL: registryBaseURL(image.registry) };

  const client = new RegistryClient(options);

  console.log(`Image: ${image.fullName}`);
  console.log(`  Registry: ${client.baseURL}`);
  console.log('');

  const response = await client.fetchManifest(image.repository, image.reference);
  const manifest = response.body;

  console.log(`Manifest (${manifestKind(manifest)})`);
  console.log(`  Media type: ${manifest.mediaType}`);
  console.log(`  Digest: ${response.headers.dockerContentDigest ?? '(not reported)'}`);

  if (isManifestIndex(manifest)) {
    for (const entry of manifest.manifests) {
      const platform = entry.platform ? `${entry.platform.os}/${entry.platform.architecture}` : 'unknown';
      console.log(`  - ${platform}: ${entry.digest}`);
    }
  } else if (isImageManifest(manifest)) {
    console.log(`  Layers: ${manifest.layers.length} (${totalLayerSize(manifest)} bytes)`);
    for (const layer of manifest.layers) {
      console.log(`  - ${layer.digest} ${layer.size}`);
    }
  }

  console.log('');
  console.log('Tags:');
  for await (const tag of client.iterateTags(image.repository, 100)) {
    console.log(`  ${tag}`);
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
