// pattern: Imperative Shell
import { z } from "zod";
import { healthReportSchema } from "../catalog/health";
import type { HealthReport } from "../catalog/health";

export const GITHUB_API = "https://api.github.com";

export const workflowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  path: z.string(),
  state: z.string(),
});

export const workflowRunSchema = z.object({
  id: z.number().int(),
  name: z.string().nullable(),
  status: z.string().nullable(),
  conclusion: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  html_url: z.string(),
  head_sha: z.string(),
  head_branch: z.string().nullable(),
});

export const repoFileSchema = z.object({
  name: z.string(),
  path: z.string(),
  sha: z.string(),
  size: z.number().int(),
  type: z.string(),
  download_url: z.string().nullable(),
});

export const repositorySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  full_name: z.string(),
  private: z.boolean(),
  html_url: z.string(),
  default_branch: z.string(),
  description: z.string().nullable().optional(),
});

const fileContentSchema = z.object({
  sha: z.string(),
  content: z.string(),
  encoding: z.string().optional(),
});

export type Workflow = z.infer<typeof workflowSchema>;
export type WorkflowRun = z.infer<typeof workflowRunSchema>;
export type RepoFile = z.infer<typeof repoFileSchema>;
export type Repository = z.infer<typeof repositorySchema>;

export type RepositoryRef = {
  readonly owner: string;
  readonly repo: string;
  readonly branch: string;
};

export class GitHubApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`GitHub API error: ${status} ${body}`);
    this.name = "GitHubApiError";
  }
}

export type GitHubClient = {
  readonly repository: RepositoryRef;
  listWorkflows(token: string): Promise<Array<Workflow>>;
  getWorkflowRuns(
    token: string,
    workflowId?: number | string,
    limit?: number,
  ): Promise<Array<WorkflowRun>>;
  triggerWorkflow(
    token: string,
    workflowId: number | string,
    ref?: string,
    inputs?: Readonly<Record<string, string>>,
  ): Promise<void>;
  listFiles(token: string, path: string): Promise<Array<RepoFile>>;
  getFileContent(token: string, path: string): Promise<{ content: string; sha: string }>;
  updateFile(
    token: string,
    path: string,
    content: string,
    message: string,
    sha?: string,
  ): Promise<void>;
  getRepository(token: string): Promise<Repository>;
  fetchHealthStatus(url: string): Promise<HealthReport>;
};

function headers(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    Accept: "application/vnd.github.v3+json",
    "X-GitHub-Api-Version": "2022-11-28",
  };
}

/**
 * REST client bound to one repository. Every call takes the signed-in
 * user's access token, so the dashboard acts with that user's permissions.
 */
export function createGitHubClient(
  repository: RepositoryRef,
  apiUrl: string = GITHUB_API,
): GitHubClient {
  const repoPath = `${apiUrl}/repos/${repository.owner}/${repository.repo}`;

  async function githubFetch(
    url: string,
    token: string,
    init: { method?: string; body?: unknown } = {},
  ): Promise<Response> {
    const response = await fetch(url, {
      method: init.method ?? "GET",
      headers: {
        ...headers(token),
        ...(init.body === undefined ? {} : { "Content-Type": "application/json" }),
      },
      ...(init.body === undefined ? {} : { body: JSON.stringify(init.body) }),
    });
    if (!response.ok) {
      throw new GitHubApiError(response.status, await response.text());
    }
    return response;
  }

  async function getFileContent(token: string, path: string) {
    const response = await githubFetch(`${repoPath}/contents/${path}`, token);
    const data = fileContentSchema.parse(await response.json());
    return {
      content: Buffer.from(data.content, "base64").toString("utf-8"),
      sha: data.sha,
    };
  }

  return {
    repository,

    async listWorkflows(token) {
      const response = await githubFetch(`${repoPath}/actions/workflows`, token);
      const data = z
        .object({ workflows: z.array(workflowSchema) })
        .parse(await response.json());
      return data.workflows;
    },

    async getWorkflowRuns(token, workflowId, limit = 10) {
      const endpoint =
        workflowId === undefined
          ? `${repoPath}/actions/runs`
          : `${repoPath}/actions/workflows/${workflowId}/runs`;
      const response = await githubFetch(`${endpoint}?per_page=${limit}`, token);
      const data = z
        .object({ workflow_runs: z.array(workflowRunSchema) })
        .parse(await response.json());
      return data.workflow_runs;
    },

    async triggerWorkflow(token, workflowId, ref = repository.branch, inputs = {}) {
      await githubFetch(
        `${repoPath}/actions/workflows/${workflowId}/dispatches`,
        token,
        { method: "POST", body: { ref, inputs } },
      );
    },

    async listFiles(token, path) {
      const response = await githubFetch(`${repoPath}/contents/${path}`, token);
      return z.array(repoFileSchema).parse(await response.json());
    },

    getFileContent,

    async updateFile(token, path, content, message, sha) {
      let fileSha = sha;
      if (fileSha === undefined) {
        try {
          fileSha = (await getFileContent(token, path)).sha;
        } catch (err) {
          // 404: the file is being created
          if (!(err instanceof GitHubApiError && err.status === 404)) throw err;
        }
      }

      await githubFetch(`${repoPath}/contents/${path}`, token, {
        method: "PUT",
        body: {
          message,
          content: Buffer.from(content, "utf-8").toString("base64"),
          ...(fileSha === undefined ? {} : { sha: fileSha }),
          branch: repository.branch,
        },
      });
    },

    async getRepository(token) {
      const response = await githubFetch(repoPath, token);
      return repositorySchema.parse(await response.json());
    },

    async fetchHealthStatus(url) {
      const response = await fetch(url);
      if (!response.ok) {
        throw new Error(`Failed to fetch health status: ${response.status}`);
      }
      return healthReportSchema.parse(await response.json());
    },
  };
}
