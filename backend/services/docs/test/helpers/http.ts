// backend/services/docs/test/helpers/http.ts
import type { Response } from "supertest";

function dumpIfProblem(res: Response) {
  const ct = res.headers["content-type"] || "";
  if (ct.includes("application/problem+json")) {
    // eslint-disable-next-line no-console
    console.error("[Problem+JSON]", JSON.stringify(res.body, null, 2));
  }
}

export async function expectStatus(
  p: PromiseLike<Response>,
  status: number
): Promise<Response> {
  const res = await p;
  if (res.status !== status) {
    dumpIfProblem(res);
    throw new Error(`Expected ${status}, got ${res.status}`);
  }
  return res;
}

export const expectOK = (p: PromiseLike<Response>) => expectStatus(p, 200);
