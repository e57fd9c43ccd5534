import { Db, Document, Filter, ObjectId } from "mongodb";
import { toObjectId } from "../shared/objectId";
import { ProtocolError } from "./platforms/platformError";

export interface InstagramCredentials {
  igUserId: string;
  accessToken: string;
}

export interface TwitterCredentials {
  accessToken: string;
}

/** Resolves already-authorised platform credentials for an account reference. */
export interface CredentialProvider {
  getInstagramCredentials(accountRef: string): Promise<InstagramCredentials>;
  getTwitterCredentials(accountRef: string): Promise<TwitterCredentials>;
}

export interface SocialAccountDocument extends Document {
  _id: ObjectId;
  platform: string;
  accountId: string;
  accessToken?: string | null;
}

/**
 * Reads tokens from the social accounts collection. An account reference may
 * be either the document id or the platform account id.
 */
export class MongoCredentialProvider implements CredentialProvider {
  constructor(
    private readonly accounts: {
      findOne(filter: Filter<SocialAccountDocument>): Promise<SocialAccountDocument | null>;
    }
  ) {}

  static fromDb(db: Db, collectionName = "socialaccounts"): MongoCredentialProvider {
    return new MongoCredentialProvider(db.collection<SocialAccountDocument>(collectionName));
  }

  async getInstagramCredentials(accountRef: string): Promise<InstagramCredentials> {
    const account = await this.findAccount("instagram", accountRef);
    return { igUserId: account.accountId, accessToken: account.accessToken };
  }

  async getTwitterCredentials(accountRef: string): Promise<TwitterCredentials> {
    const account = await this.findAccount("twitter", accountRef);
    return { accessToken: account.accessToken };
  }

  private async findAccount(
    platform: string,
    accountRef: string
  ): Promise<SocialAccountDocument & { accessToken: string }> {
    const objectId = toObjectId(accountRef);
    const filter: Filter<SocialAccountDocument> = {
      platform,
      $or: [...(objectId ? [{ _id: objectId }] : []), { accountId: accountRef }],
    };

    const account = await this.accounts.findOne(filter);
    if (!account) {
      throw new ProtocolError(`No ${platform} account found for ${accountRef}`, "credentials");
    }

    const { accessToken } = account;
    if (!accessToken) {
      throw new ProtocolError(`Missing access token for ${platform} account ${accountRef}`, "credentials");
    }
    return { ...account, accessToken };
  }
}
