/**
 * JSON ドキュメントをまるごと読み書きする保存先。
 * ストアはこのインターフェースだけに依存するので、テストではメモリ版に差し替えられる。
 */
export interface JsonStorage {
	/** 存在しないときは undefined を返す */
	read(name: string): Promise<unknown>;

	write(name: string, value: unknown): Promise<void>;
}
