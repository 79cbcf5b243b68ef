/**
 * Shapes exchanged with the LinkedIn v2 REST API.
 */

export const VISIBILITIES = ['PUBLIC', 'CONNECTIONS'] as const;

export type Visibility = (typeof VISIBILITIES)[number];

/**
 * Subset of the OpenID Connect userinfo response we rely on
 */
export interface LinkedInUserInfo {
  sub: string;
  name?: string;
  given_name?: string;
  family_name?: string;
  email?: string;
  [key: string]: unknown;
}

/**
 * Body of POST /ugcPosts for a text-only share
 */
export interface UgcPostBody {
  author: string;
  lifecycleState: 'PUBLISHED';
  specificContent: {
    'com.linkedin.ugc.ShareContent': {
      shareCommentary: {
        text: string;
      };
      shareMediaCategory: 'NONE';
    };
  };
  visibility: {
    'com.linkedin.ugc.MemberNetworkVisibility': Visibility;
  };
}

export interface PublishedPost {
  status: 'success';
  postId: string;
  details: {
    timestamp: string;
  };
}
