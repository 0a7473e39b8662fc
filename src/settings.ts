type Value = string | number;

/** A ONE host group; keys are written as `GroupN.<key>` once the index is known. */
export class HostGroup {
    readonly values = new Map<string, Value>();
    readonly okMaps: string[] = [];

    constructor(readonly name: string, delimiter = "") {
        this.set("groupID", name + delimiter);
    }

    set(key: string, value: Value) {
        this.values.set(key, value);
        return this;
    }

    setOkMap(file: string) {
        this.okMaps.push(file);
        return this;
    }
}

/**
 * Builds the contents of a ONE settings file. Plain lines are kept in the
 * order they are set; `completeGroups` appends the host groups and the map
 * files they reference.
 */
export class ScenarioSettings {
    private readonly lines: string[] = [];
    private readonly groups: HostGroup[] = [];

    constructor(readonly scenario: string) {
        this.set("Scenario.name", scenario);
    }

    set(key: string, value: Value) {
        this.lines.push(`${key} = ${value}`);
        return this;
    }

    spacer() {
        this.lines.push("");
        return this;
    }

    addGroup(group: HostGroup) {
        this.groups.push(group);
        return this;
    }

    get hostCount() {
        let n = 0;
        for (const g of this.groups) n += Number(g.values.get("nrofHosts") ?? 0);
        return n;
    }

    completeGroups() {
        const mapFiles: string[] = [];
        const mapIndex = (file: string) => {
            let i = mapFiles.indexOf(file);
            if (i < 0) i = mapFiles.push(file) - 1;
            return i + 1;
        };

        this.set("Scenario.nrofHostGroups", this.groups.length);
        this.groups.forEach((g, i) => {
            const prefix = `Group${i + 1}`;
            for (const [key, value] of g.values) this.set(`${prefix}.${key}`, value);
            if (g.okMaps.length) this.set(`${prefix}.okMaps`, g.okMaps.map(mapIndex).join(", "));
        });

        if (mapFiles.length) {
            this.spacer();
            this.set("MapBasedMovement.nrofMapFiles", mapFiles.length);
            mapFiles.forEach((file, i) => this.set(`MapBasedMovement.mapFile${i + 1}`, file));
        }
        return this;
    }

    toString() {
        return this.lines.join("\n") + "\n";
    }
}
