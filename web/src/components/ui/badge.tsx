import { clsx } from "clsx";
import type * as React from "react";

type BadgeProps = React.HTMLAttributes<HTMLSpanElement> & {
	variant?: "default" | "secondary" | "outline" | "annotated" | "warning";
};

const variants: Record<NonNullable<BadgeProps["variant"]>, string> = {
	default: "bg-primary text-primary-foreground",
	secondary: "bg-secondary text-secondary-foreground",
	outline: "border border-input text-muted-foreground",
	annotated: "bg-emerald-100 text-emerald-800",
	warning: "bg-amber-100 text-amber-900",
};

const Badge: React.FC<BadgeProps> = ({
	className,
	variant = "default",
	...props
}) => (
	<span
		className={clsx(
			"inline-flex items-center gap-1 rounded-full px-2.5 py-0.5 text-xs font-semibold",
			variants[variant],
			className,
		)}
		{...props}
	/>
);

export { Badge };
