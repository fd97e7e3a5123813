import * as _path from "path";

/**
 * Relative paths are taken from the directory the client was started in.
 */
export function path(path: string): string {
	if (_path.isAbsolute(path)) {
		return path;
	}
	return _path.resolve(process.cwd(), path);
}
