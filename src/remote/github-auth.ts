/**
 * Repository coordinates and the personal access token used for API calls
 */

export interface RepoCoordinates {
  owner: string;
  repo: string;
}

const REPO_URL_PATTERN = /^github\.com\/([^/]+)\/([^/]+)$/;

export class GitHubAuth {
  readonly owner: string;
  readonly repo: string;
  readonly baseUrl: string;
  private token: string;

  constructor(options: { owner: string; repo: string; token: string; baseUrl?: string }) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.token = options.token;
    this.baseUrl = options.baseUrl ?? "https://api.github.com";
  }

  /**
   * Build from a full repository URL
   *
   * @throws Error if the URL is not a github.com repository URL
   */
  static fromUrl(repoUrl: string, token: string, baseUrl?: string): GitHubAuth {
    const parsed = parseRepoUrl(repoUrl);
    if (!parsed) {
      throw new Error(`Invalid GitHub repository URL: ${repoUrl}`);
    }
    return new GitHubAuth({ ...parsed, token, baseUrl });
  }

  get repoPath(): string {
    return `/repos/${this.owner}/${this.repo}`;
  }

  contentsPath(filePath: string): string {
    const relative = filePath.startsWith("/") ? filePath.slice(1) : filePath;
    return `${this.repoPath}/contents/${relative}`;
  }

  get headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
    };
  }

  toString(): string {
    return `GitHubAuth(${this.owner}/${this.repo})`;
  }
}

/**
 * Parse `https://github.com/owner/repo(.git)`, `github.com/owner/repo`
 * or `www.github.com/owner/repo`
 */
export function parseRepoUrl(url: string): RepoCoordinates | null {
  const cleaned = url
    .trim()
    .replace(/\.git$/, "")
    .replace(/^https?:\/\//, "")
    .replace(/^www\./, "");

  const match = REPO_URL_PATTERN.exec(cleaned);
  if (!match) {
    return null;
  }
  const [, owner, repo] = match;
  if (!owner || !repo) {
    return null;
  }
  return { owner, repo };
}
