import { createLogger } from "@lp-builds/shared";
import type { ImageBuildRequest, ImageBuildResult } from "@lp-builds/shared";
import type { SymmetricEncryptor } from "./encryption.js";
import type { RequestGateway } from "./gateway.js";
import { livefsPath, type BoardResolver } from "./resolver.js";

export interface ImageBuilderOptions {
  gateway: RequestGateway;
  resolver: BoardResolver;
  encryptor: SymmetricEncryptor;
}

/**
 * ImageBuilder requests Ubuntu image builds on the livefs matching the
 * board and system, passing the snaps to preinstall and the encrypted
 * author details in the metadata override.
 */
export class ImageBuilder {
  private logger = createLogger("images");
  private options: ImageBuilderOptions;

  constructor(options: ImageBuilderOptions) {
    this.options = options;
  }

  async requestImageBuild(request: ImageBuildRequest): Promise<ImageBuildResult> {
    const { gateway, resolver, encryptor } = this.options;
    const target = resolver.resolve(request.board, request.systemLabel, request.architecture);

    const authorData = await encryptor.encrypt(
      JSON.stringify(request.authorInfo),
      request.passphrase,
    );

    const metadata = {
      subarch: target.subArchitecture,
      extra_snaps: request.snaps,
      project: target.project,
      channel: "stable",
      image_format: "ubuntu-image",
      _author_data: authorData,
    };

    const path = livefsPath(gateway.username, target);
    const resp = await gateway.call(path, {
      method: "POST",
      body: {
        "ws.op": "requestBuild",
        pocket: "Updates",
        archive: gateway.url("ubuntu/+archive/primary"),
        distro_arch_series: gateway.url(`ubuntu/${target.codename}/${target.architecture}`),
        metadata_override: JSON.stringify(metadata),
      },
    });

    const buildUrl = resp.headers.get("location");
    this.logger.info(
      `Requested ${target.project} ${target.codename}/${target.architecture} image for ${target.board}`,
    );
    return { target, buildUrl };
  }
}
