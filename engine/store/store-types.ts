export interface StoreConfig {
	/** Path to the persisted tree file */
	filePath: string;
}
