import { Injectable, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import { ConfigService } from "@nestjs/config";
import { timingSafeEqual as constantTimeEqual } from "node:crypto";

@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).send("Authentication required");
		}

		const base64 = header.slice("Basic ".length).trim();
		const decoded = Buffer.from(base64, "base64").toString("utf8");

		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const expectedUser = this.config.get<string>("BACKOFFICE_BASIC_USER") ?? "";
		const expectedPass = this.config.get<string>("BACKOFFICE_BASIC_PASS") ?? "";
		// unset credentials lock the operator surface
		if (!expectedUser || !expectedPass) {
			return res.status(401).send("Unauthorized");
		}

		const ok =
			timingSafeEqual(username, expectedUser) &&
			timingSafeEqual(password, expectedPass);
		if (!ok) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).send("Unauthorized");
		}

		return next();
	}
}

export function timingSafeEqual(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		// compare anyway
		constantTimeEqual(ab, ab);
		return false;
	}
	return constantTimeEqual(ab, bb);
}
