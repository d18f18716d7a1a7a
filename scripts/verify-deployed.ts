import "dotenv/config";

function readArg(name: string): string | undefined {
  const idx = process.argv.findIndex((arg) => arg === `--${name}`);
  if (idx >= 0 && process.argv[idx + 1]) {
    return process.argv[idx + 1];
  }

  const prefixed = process.argv.find((arg) => arg.startsWith(`--${name}=`));
  if (!prefixed) {
    return undefined;
  }

  return prefixed.slice(name.length + 3);
}

async function parseJsonResponse(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return {};
  }

  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function main(): Promise<void> {
  const baseUrl = (readArg("base-url") || process.env.VERIFY_BASE_URL || "").replace(/\/+$/, "");
  if (!baseUrl) {
    console.error("Missing base URL. Provide --base-url or set VERIFY_BASE_URL.");
    process.exit(1);
  }

  const docId = readArg("doc-id") || `VERIFY-${Date.now()}`;
  const username = readArg("username") || process.env.CMS_USERNAME || "verify";
  const password = readArg("password") || process.env.GIT_DOC_MAPPER_PASSWORD || process.env.CMS_PASSWORD || "";
  const tranxNum = readArg("tranx-num") || process.env.ACTION_CODE_TRANSACTION || "";
  const authorization = `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;

  const actionCodeUrl = (route: string, extra = ""): string =>
    `${baseUrl}/actioncode?tranxNum=${encodeURIComponent(tranxNum)}&route=${route}${extra}`;

  console.log(`Verifying deployed action-code server: ${baseUrl}`);

  const healthResponse = await fetch(`${baseUrl}/health`);
  const healthBody = await parseJsonResponse(healthResponse);

  const anonymousResponse = await fetch(actionCodeUrl("show", `&docId=${encodeURIComponent(docId)}`));
  const anonymousBody = await parseJsonResponse(anonymousResponse);

  const showResponse = await fetch(actionCodeUrl("show", `&docId=${encodeURIComponent(docId)}`), {
    headers: { authorization }
  });
  const showBody = await parseJsonResponse(showResponse);

  const unknownRouteResponse = await fetch(actionCodeUrl("verify-unknown"), {
    method: "POST",
    headers: { authorization }
  });
  const unknownRouteText = await unknownRouteResponse.text();

  const checks = [
    {
      label: "Health",
      passed: healthResponse.ok && isRecord(healthBody) && healthBody.status === "ok",
      details: { status: healthResponse.status, body: healthBody }
    },
    {
      label: "Action code requires credentials",
      passed: anonymousResponse.status === 401,
      details: { status: anonymousResponse.status, body: anonymousBody }
    },
    {
      label: `Show ${docId}`,
      passed: showResponse.ok && isRecord(showBody),
      details: { status: showResponse.status, body: showBody }
    },
    {
      label: "Unknown route answers empty",
      passed: unknownRouteResponse.status === 200 && unknownRouteText === "",
      details: { status: unknownRouteResponse.status, body: unknownRouteText }
    }
  ];

  for (const check of checks) {
    console.log(`${check.passed ? "PASS" : "FAIL"} - ${check.label}`);
    if (!check.passed) {
      console.log(JSON.stringify(check.details));
    }
  }

  const failed = checks.filter((check) => !check.passed);
  if (failed.length > 0) {
    process.exit(1);
  }

  console.log("All deployed smoke checks passed.");
}

main().catch((error) => {
  console.error("Verification failed:", error);
  process.exit(1);
});
