import { PublishOutcome, ScheduledPost } from "../scheduledPost/scheduledPost.model";
import {
  CredentialProvider,
  TwitterCredentials,
} from "../services/credentials.service";
import {
  classifyHttpError,
  ProtocolError,
} from "../services/platforms/platformError";
import { CreatePostInput, CreatedPost } from "../services/platforms/twitter.service";
import { ResumableSingleShotUpload } from "../uploads/resumableSingleShot.upload";
import { ChunkedMultipartUpload } from "../uploads/chunkedMultipart.upload";
import { BlobStaging } from "../utils/blobStaging";

export interface TextPoster {
  createPost(credentials: TwitterCredentials, input: CreatePostInput): Promise<CreatedPost>;
}

export interface PlatformPublishers {
  credentials: CredentialProvider;
  blobs: BlobStaging;
  resumable: Pick<ResumableSingleShotUpload, "run">;
  chunked: Pick<ChunkedMultipartUpload, "run">;
  text: TextPoster;
}

async function fetchMedia(post: ScheduledPost, blobs: BlobStaging): Promise<Buffer> {
  if (!post.mediaRef) {
    throw new ProtocolError(`Post ${post.id} has no staged media`, "fetchMedia");
  }
  try {
    return await blobs.get(post.mediaRef);
  } catch (error) {
    throw classifyHttpError(error, "fetchMedia");
  }
}

/**
 * Runs the pipeline for a claimed post's platform and resolves with the
 * remote id. Any failure surfaces as a PublishError.
 */
export const postToPlatform = async (
  post: ScheduledPost,
  publishers: PlatformPublishers,
  signal?: AbortSignal
): Promise<PublishOutcome> => {
  const { credentials, blobs } = publishers;

  switch (post.platform) {
    case "text_only": {
      const account = await credentials.getTwitterCredentials(post.accountRef);
      const created = await publishers.text.createPost(account, {
        text: post.caption,
        replyToPostId: post.replyToPostId,
      });
      return { remotePostId: created.id, permalink: created.url };
    }

    case "instagram": {
      const account = await credentials.getInstagramCredentials(post.accountRef);
      const media = await fetchMedia(post, blobs);
      return publishers.resumable.run(account, media, post.caption, signal);
    }

    case "video_attached": {
      const account = await credentials.getTwitterCredentials(post.accountRef);
      const media = await fetchMedia(post, blobs);
      const mediaId = await publishers.chunked.run(account, media, signal);
      const created = await publishers.text.createPost(account, {
        text: post.caption,
        mediaIds: [mediaId],
        replyToPostId: post.replyToPostId,
      });
      return { remotePostId: created.id, permalink: created.url };
    }

    default: {
      const unsupported: never = post.platform;
      throw new ProtocolError(`Unsupported platform: ${String(unsupported)}`, "createPost");
    }
  }
};
