import { clsx } from "clsx";
import type * as React from "react";

type DivProps = React.HTMLAttributes<HTMLDivElement>;

const Card: React.FC<DivProps> = ({ className, ...props }) => (
	<div
		className={clsx(
			"rounded-lg border bg-card text-card-foreground shadow-sm",
			className,
		)}
		{...props}
	/>
);

const CardHeader: React.FC<DivProps> = ({ className, ...props }) => (
	<div className={clsx("flex flex-col space-y-1.5 p-6", className)} {...props} />
);

const CardTitle: React.FC<React.HTMLAttributes<HTMLHeadingElement>> = ({
	className,
	...props
}) => (
	<h3
		className={clsx(
			"text-lg font-semibold leading-none tracking-tight",
			className,
		)}
		{...props}
	/>
);

const CardContent: React.FC<DivProps> = ({ className, ...props }) => (
	<div className={clsx("p-6 pt-0", className)} {...props} />
);

export { Card, CardContent, CardHeader, CardTitle };
