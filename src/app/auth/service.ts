import type { DbClient, Row } from "../../lib/database";
import type { User } from "../../types/dto";

const toUser = (row: Row): User | undefined => {
	if (typeof row.username !== "string") return undefined;
	return {
		username: row.username,
		email: typeof row.email === "string" ? row.email : null,
		full_name: typeof row.full_name === "string" ? row.full_name : null,
		// SQLite stores booleans as 0/1
		disabled: Boolean(row.disabled),
	};
};

export class UserService {
	constructor(private readonly db: DbClient) {}

	async findByUsername(username: string): Promise<User | undefined> {
		const rows = await this.db.executeQuery(
			"SELECT username, email, full_name, disabled FROM users " +
				"WHERE username = ?",
			[username],
		);
		const [row] = rows;
		return row ? toUser(row) : undefined;
	}
}
