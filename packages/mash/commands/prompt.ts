import { isCancel, text } from "@clack/prompts"
import type { Confirm } from "@/types/context"

export const promptConfirm: Confirm = async (message) => {
	const answer = await text({ message, placeholder: "n" })
	if (isCancel(answer)) {
		return null
	}
	return answer
}
