import { z } from "zod"

export const ComposeServiceSchema = z.object({
	image: z.string().min(1),
	container_name: z.string().min(1),
	environment: z.record(z.string(), z.string()),
	volumes: z.array(z.string()),
	ports: z.array(z.string().regex(/^\d+:\d+$/)),
	extra_hosts: z.array(z.string()),
	tty: z.boolean(),
	stdin_open: z.boolean(),
	restart: z.enum(["no", "unless-stopped"]),
})

export const DockerComposeSchema = z.object({
	services: z.record(z.string(), ComposeServiceSchema),
})

export type ComposeService = z.infer<typeof ComposeServiceSchema>
export type DockerComposeConfig = z.infer<typeof DockerComposeSchema>
