import { AppError } from '../Error/AppError';

interface ValidationResult {
	success: boolean;
	error?: { issues: ReadonlyArray<{ message: string }> };
}

/**
 * zValidator の第3引数に渡すフック。
 * 検証に失敗したら最初のエラーメッセージで invalid_request を投げる。
 */
export const rejectInvalid = (result: ValidationResult): void => {
	if (!result.success) {
		throw new AppError('invalid_request', result.error?.issues[0]?.message ?? 'Invalid request');
	}
};
