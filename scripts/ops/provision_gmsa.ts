import fs from "fs";
import crypto from "crypto";
import { pathToFileURL } from "url";
import { bootstrap } from "../../libs/bootstrap/startup.js";
import { logger } from "../../libs/logging/logger.js";
import { RequestContext } from "../../libs/context/requestContext.js";
import { ProvisioningError } from "../../libs/errors/sanitizer.js";
import { ProvisioningWorkflow } from "../../libs/provisioning/workflow.js";
import { ProvisioningResult, failedResultFrom } from "../../libs/provisioning/result.js";
import { ProvisioningResponse, reportResult } from "../../libs/audit/reporter.js";
import { accountNameHint } from "../../libs/validation/schema.js";

/**
 * Operator CLI: provision one gMSA outside the webhook path.
 *
 * Usage: provision_gmsa.ts <request.json | ->
 * Reads the same JSON body the webhook takes, runs the workflow with the
 * configured backends and prints the response. Exit code 1 on Failed.
 */

export interface CliOutcome {
    readonly exitCode: number;
    readonly response: ProvisioningResponse;
}

export async function provisionFromText(
    workflow: ProvisioningWorkflow,
    text: string,
    signal?: AbortSignal
): Promise<CliOutcome> {
    return RequestContext.run({ requestId: crypto.randomUUID(), source: "cli" }, async () => {
        const result = await runText(workflow, text, signal);
        return {
            exitCode: result.status === "Failed" ? 1 : 0,
            response: reportResult(result)
        };
    });
}

async function runText(workflow: ProvisioningWorkflow, text: string, signal?: AbortSignal): Promise<ProvisioningResult> {
    let payload: unknown;
    try {
        payload = JSON.parse(text);
    } catch (error: unknown) {
        return failedResultFrom(new ProvisioningError(
            "MalformedPayload",
            "Request file is not valid JSON",
            { parseError: error instanceof Error ? error.message : String(error) },
            { cause: error, step: "Parse" }
        ));
    }

    return RequestContext.withAccount(accountNameHint(payload), () =>
        workflow.run(payload, signal ? { signal } : {})
    );
}

async function readInput(source: string): Promise<string> {
    if (source !== "-") {
        return fs.promises.readFile(source, "utf8");
    }
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf8");
}

async function main(): Promise<number> {
    const source = process.argv[2];
    if (!source) {
        console.error("Usage: provision_gmsa.ts <request.json | ->");
        return 2;
    }

    const runtime = bootstrap("provision-gmsa-cli");
    const controller = new AbortController();
    process.once("SIGINT", () => {
        logger.warn("Interrupted; cancelling if the account has not been created yet");
        controller.abort();
    });

    const outcome = await provisionFromText(runtime.workflow, await readInput(source), controller.signal);
    console.log(JSON.stringify(outcome.response, null, 2));
    return outcome.exitCode;
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
    main()
        .then(code => { process.exitCode = code; })
        .catch(err => {
            logger.fatal(err);
            process.exitCode = 1;
        });
}
