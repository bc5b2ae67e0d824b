import http from "http";
import type { BotController } from "@crossbot/runtime";
import {
	ApiResponse,
	BadRequestError,
	createRoutes,
	dispatch,
} from "./routes";

const MAX_BODY_BYTES = 64 * 1024;

const readBody = async (req: http.IncomingMessage): Promise<unknown> => {
	const chunks: Buffer[] = [];
	let size = 0;
	for await (const chunk of req) {
		const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += buffer.length;
		if (size > MAX_BODY_BYTES) {
			throw new BadRequestError("Request body too large");
		}
		chunks.push(buffer);
	}
	const raw = Buffer.concat(chunks).toString("utf8").trim();
	if (!raw) {
		return undefined;
	}
	try {
		return JSON.parse(raw);
	} catch {
		throw new BadRequestError("Request body must be valid JSON");
	}
};

const send = (res: http.ServerResponse, response: ApiResponse): void => {
	res.writeHead(response.status, { "Content-Type": "application/json" });
	res.end(JSON.stringify(response.body));
};

export const createRequestListener = (
	controller: BotController
): http.RequestListener => {
	const routes = createRoutes(controller);
	return (req, res) => {
		const method = req.method ?? "GET";
		const path = new URL(req.url ?? "/", "http://localhost").pathname;
		readBody(req)
			.then((body) => dispatch(routes, { method, path, body }))
			.catch((error: unknown) => ({
				status: 400,
				body: {
					detail: error instanceof Error ? error.message : String(error),
				},
			}))
			.then((response) => send(res, response))
			.catch((error: unknown) => {
				res.destroy(error instanceof Error ? error : undefined);
			});
	};
};

export const createServer = (controller: BotController): http.Server =>
	http.createServer(createRequestListener(controller));
