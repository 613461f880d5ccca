import type { NextFunction, Request, RequestHandler, Response } from "express";
import jwt from "jsonwebtoken";
import type { UserService } from "./service";

const unauthorized = (res: Response) => {
	res
		.status(401)
		.setHeader("WWW-Authenticate", "Bearer")
		.json({ error: "Could not validate credentials" });
};

// Reads the subject of a bearer token; undefined when the token is unusable
const subjectOf = (header: string | undefined, secret: string) => {
	if (!header?.startsWith("Bearer ")) return undefined;
	const token = header.slice(7).trim();
	try {
		const payload = jwt.verify(token, secret, { algorithms: ["HS256"] });
		if (typeof payload === "string") return undefined;
		return typeof payload.sub === "string" && payload.sub
			? payload.sub
			: undefined;
	} catch {
		return undefined; // expired, bad signature, malformed
	}
};

// Resolve the current active user; the user lands on res.locals.user
export const requireActiveUser = (
	users: UserService,
	secret: string,
): RequestHandler => {
	return async (req: Request, res: Response, next: NextFunction) => {
		const username = subjectOf(req.headers.authorization, secret);
		if (!username) {
			unauthorized(res);
			return;
		}

		try {
			const user = await users.findByUsername(username);
			if (!user) {
				unauthorized(res);
				return;
			}
			if (user.disabled) {
				res.status(400).json({ error: "Inactive user" });
				return;
			}
			res.locals.user = user;
			next();
		} catch (e) {
			next(e);
		}
	};
};
